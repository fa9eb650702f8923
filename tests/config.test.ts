// tests/config.test.ts — Environment configuration

import { describe, it, expect } from "vitest"
import { loadConfig } from "../src/config.js"

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: "0.0.0.0",
      session: { cookieName: "sid", idleMs: 1_800_000, secure: false },
      csrf: {
        parameterName: undefined,
        headerName: undefined,
        tokenLength: undefined,
        sessionKey: undefined,
        addMeta: false,
        metaName: undefined,
        onetime: false,
      },
    })
  })

  it("reads every variable", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      SESSION_COOKIE_NAME: "app_sid",
      SESSION_IDLE_MS: "60000",
      SESSION_COOKIE_SECURE: "true",
      CSRF_PARAMETER_NAME: "_csrf",
      CSRF_HEADER_NAME: "X-Token",
      CSRF_TOKEN_LENGTH: "24",
      CSRF_SESSION_KEY: "app.csrf",
      CSRF_ADD_META: "true",
      CSRF_META_NAME: "csrf-token",
      CSRF_ONETIME: "true",
    })

    expect(config).toEqual({
      port: 8080,
      host: "127.0.0.1",
      session: { cookieName: "app_sid", idleMs: 60_000, secure: true },
      csrf: {
        parameterName: "_csrf",
        headerName: "X-Token",
        tokenLength: 24,
        sessionKey: "app.csrf",
        addMeta: true,
        metaName: "csrf-token",
        onetime: true,
      },
    })
  })

  it("only treats the literal \"true\" as enabled", () => {
    const config = loadConfig({ CSRF_ADD_META: "1", CSRF_ONETIME: "yes", SESSION_COOKIE_SECURE: "TRUE" })
    expect(config.csrf.addMeta).toBe(false)
    expect(config.csrf.onetime).toBe(false)
    expect(config.session.secure).toBe(false)
  })

  it.each([
    ["PORT", "abc"],
    ["PORT", "30x"],
    ["SESSION_IDLE_MS", "1.5"],
    ["CSRF_TOKEN_LENGTH", ""],
  ])("rejects %s=%j", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(`${key} must be a valid integer (got "${value}")`)
  })
})
