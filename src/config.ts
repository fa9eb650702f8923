// src/config.ts — Configuration loader from environment variables

import type { CsrfBlockOptions } from "./csrf/config.js"

export interface AppConfig {
  // Gateway
  port: number
  host: string

  // Sessions
  session: {
    cookieName: string
    idleMs: number
    secure: boolean
  }

  // CSRF middleware (logger, handlers and strategies are wired in code)
  csrf: Pick<
    CsrfBlockOptions,
    "parameterName" | "headerName" | "tokenLength" | "sessionKey" | "addMeta" | "metaName" | "onetime"
  >
}

type Env = Record<string, string | undefined>

function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const parsed = parseInt(raw, 10)
  if (isNaN(parsed) || String(parsed) !== raw.trim()) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return parsed
}

function optionalIntEnv(env: Env, envKey: string): number | undefined {
  return env[envKey] === undefined ? undefined : parseIntEnv(env, envKey, "")
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseIntEnv(env, "PORT", "3000"),
    host: env.HOST ?? "0.0.0.0",

    session: {
      cookieName: env.SESSION_COOKIE_NAME ?? "sid",
      idleMs: parseIntEnv(env, "SESSION_IDLE_MS", String(30 * 60 * 1000)),
      secure: env.SESSION_COOKIE_SECURE === "true",
    },

    csrf: {
      parameterName: env.CSRF_PARAMETER_NAME,
      headerName: env.CSRF_HEADER_NAME,
      tokenLength: optionalIntEnv(env, "CSRF_TOKEN_LENGTH"),
      sessionKey: env.CSRF_SESSION_KEY,
      addMeta: env.CSRF_ADD_META === "true",
      metaName: env.CSRF_META_NAME,
      onetime: env.CSRF_ONETIME === "true",
    },
  }
}
