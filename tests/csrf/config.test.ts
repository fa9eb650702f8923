// tests/csrf/config.test.ts — Option resolution and validation

import { describe, it, expect } from "vitest"
import { resolveCsrfConfig, normalizeHeaderName, CSRF_DEFAULTS } from "../../src/csrf/config.js"
import { CsrfConfigurationError } from "../../src/csrf/errors.js"
import { DEFAULT_MAX_MARKUP_LENGTH } from "../../src/csrf/html-scanner.js"

function configError(fn: () => unknown): CsrfConfigurationError {
  try {
    fn()
  } catch (err) {
    if (err instanceof CsrfConfigurationError) return err
    throw err
  }
  throw new Error("expected a CsrfConfigurationError")
}

describe("resolveCsrfConfig", () => {
  it("fills every default", () => {
    const config = resolveCsrfConfig()
    expect(config.parameterName).toBe("SEC")
    expect(config.headerName).toBe("x-csrf-token")
    expect(config.tokenLength).toBe(16)
    expect(config.sessionKey).toBe("csrfblock.token")
    expect(config.addMeta).toBe(false)
    expect(config.metaName).toBe("csrftoken")
    expect(config.onetime).toBe(false)
    expect(config.blocked).toBeUndefined()
    expect(config.maxMarkupLength).toBe(DEFAULT_MAX_MARKUP_LENGTH)
    expect(config.tokenGenerator()).toMatch(/^[0-9a-f]{16}$/)
  })

  it("exposes the documented defaults", () => {
    expect(CSRF_DEFAULTS).toEqual({
      parameterName: "SEC",
      headerName: "X-CSRF-Token",
      tokenLength: 16,
      sessionKey: "csrfblock.token",
      metaName: "csrftoken",
    })
  })

  it("applies tokenLength to the built-in generator", () => {
    expect(resolveCsrfConfig({ tokenLength: 40 }).tokenGenerator()).toMatch(/^[0-9a-f]{40}$/)
  })

  it("uses a custom generator as-is", () => {
    expect(resolveCsrfConfig({ tokenLength: 4, tokenGenerator: () => "abcdefgh" }).tokenGenerator()).toBe("abcdefgh")
  })

  it("is frozen", () => {
    expect(Object.isFrozen(resolveCsrfConfig())).toBe(true)
  })

  it.each([0, 41, 1.5, Number.NaN])("rejects tokenLength %s", (tokenLength) => {
    expect(configError(() => resolveCsrfConfig({ tokenLength })).code).toBe("CONFIG_INVALID")
  })

  it.each([
    { parameterName: "" },
    { parameterName: "jeton-é" },
    { metaName: "a\nb" },
    { sessionKey: "" },
    { headerName: "bad header" },
    { headerName: "" },
    { maxMarkupLength: 0 },
  ])("rejects %o", (options) => {
    expect(configError(() => resolveCsrfConfig(options)).code).toBe("CONFIG_INVALID")
  })

  it("allows non-ASCII session keys", () => {
    expect(resolveCsrfConfig({ sessionKey: "jeton.é" }).sessionKey).toBe("jeton.é")
  })
})

describe("normalizeHeaderName", () => {
  it("trims and lowercases", () => {
    expect(normalizeHeaderName("  X-Custom-Token ")).toBe("x-custom-token")
  })
})

describe("CsrfConfigurationError", () => {
  it("serializes code, message and context", () => {
    const err = configError(() => normalizeHeaderName("a b"))
    expect(err.name).toBe("CsrfConfigurationError")
    expect(err.toJSON()).toEqual({
      error: "CsrfConfigurationError",
      code: "CONFIG_INVALID",
      message: "[csrf] CONFIG_INVALID: headerName must be a valid HTTP header name (got \"a b\")",
      context: { option: "headerName" },
    })
  })
})
