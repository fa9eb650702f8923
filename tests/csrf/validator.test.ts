// tests/csrf/validator.test.ts — POST token validation

import { describe, it, expect } from "vitest"
import { RequestValidator } from "../../src/csrf/validator.js"
import type { CsrfRequest } from "../../src/csrf/validator.js"
import { TokenStore } from "../../src/csrf/token-store.js"

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface FakeRequestInit {
  method?: string
  headers?: Record<string, string>
  params?: Record<string, string>
}

function makeRequest(init: FakeRequestInit = {}): CsrfRequest & { paramLookups: string[] } {
  const headers = new Map(Object.entries(init.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]))
  const paramLookups: string[] = []
  return {
    method: init.method ?? "POST",
    header: (name) => headers.get(name.toLowerCase()),
    param: async (name) => {
      paramLookups.push(name)
      return init.params?.[name]
    },
    paramLookups,
  }
}

function setup(options: { onetime?: boolean; token?: string } = {}) {
  const store = new TokenStore("csrfblock.token")
  const session = new Map<string, unknown>()
  if (options.token !== undefined) session.set("csrfblock.token", options.token)
  const validator = new RequestValidator({
    store,
    headerName: "x-csrf-token",
    parameterName: "SEC",
    onetime: options.onetime ?? false,
  })
  return { store, session, validator }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("RequestValidator", () => {
  it.each(["GET", "HEAD", "PUT", "DELETE", "OPTIONS"])("skips %s entirely", async (method) => {
    const { validator, session } = setup()
    const req = makeRequest({ method })
    expect(await validator.validate(req, session)).toEqual({ accepted: true })
    expect(req.paramLookups).toEqual([])
  })

  it("rejects a POST when no token was ever issued", async () => {
    const { validator, session } = setup()
    const req = makeRequest({ params: { SEC: "anything" } })
    expect(await validator.validate(req, session)).toEqual({ accepted: false, reason: "token_missing" })
  })

  it("matches the method case-insensitively", async () => {
    const { validator, session } = setup()
    expect(await validator.validate(makeRequest({ method: "post" }), session)).toEqual({
      accepted: false,
      reason: "token_missing",
    })
  })

  it("accepts a matching header without reading parameters", async () => {
    const { validator, session } = setup({ token: "T" })
    const req = makeRequest({ headers: { "X-CSRF-Token": "T" }, params: { SEC: "WRONG" } })
    expect(await validator.validate(req, session)).toEqual({ accepted: true, via: "header" })
    expect(req.paramLookups).toEqual([])
  })

  it("falls back to the form parameter", async () => {
    const { validator, session } = setup({ token: "T" })
    const req = makeRequest({ headers: { "X-CSRF-Token": "stale" }, params: { SEC: "T" } })
    expect(await validator.validate(req, session)).toEqual({ accepted: true, via: "parameter" })
    expect(req.paramLookups).toEqual(["SEC"])
  })

  it("rejects a wrong parameter", async () => {
    const { validator, session } = setup({ token: "T" })
    const req = makeRequest({ params: { SEC: "WRONG" } })
    expect(await validator.validate(req, session)).toEqual({ accepted: false, reason: "token_mismatch" })
  })

  it("compares case-sensitively", async () => {
    const { validator, session } = setup({ token: "abc" })
    const req = makeRequest({ params: { SEC: "ABC" } })
    expect(await validator.validate(req, session)).toEqual({ accepted: false, reason: "token_mismatch" })
  })

  it("rejects when neither header nor parameter is present", async () => {
    const { validator, session } = setup({ token: "T" })
    expect(await validator.validate(makeRequest(), session)).toEqual({ accepted: false, reason: "token_mismatch" })
  })

  describe("onetime", () => {
    it("removes the token after a successful check", async () => {
      const { validator, session, store } = setup({ onetime: true, token: "T" })
      expect(await validator.validate(makeRequest({ params: { SEC: "T" } }), session)).toEqual({
        accepted: true,
        via: "parameter",
      })
      expect(store.get(session)).toBeUndefined()

      // Replaying the same token now fails
      expect(await validator.validate(makeRequest({ params: { SEC: "T" } }), session)).toEqual({
        accepted: false,
        reason: "token_missing",
      })
    })

    it("keeps the token when the check fails", async () => {
      const { validator, session, store } = setup({ onetime: true, token: "T" })
      await validator.validate(makeRequest({ params: { SEC: "WRONG" } }), session)
      await validator.validate(makeRequest({ headers: { "X-CSRF-Token": "nope" } }), session)
      expect(store.get(session)).toBe("T")
    })

    it("leaves the token alone on non-POST requests", async () => {
      const { validator, session, store } = setup({ onetime: true, token: "T" })
      await validator.validate(makeRequest({ method: "GET" }), session)
      expect(store.get(session)).toBe("T")
    })
  })
})
