// src/csrf/types.ts — Shared CSRF middleware types

import type { Context } from "hono"

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Mapping-like session bound 1:1 to an HTTP session. Persistence, locking
 * and expiry belong to whoever provides it. A `Map<string, unknown>` fits.
 */
export interface CsrfSession {
  get(key: string): unknown
  set(key: string, value: string): void
  delete(key: string): void
}

/** Hono environment the middleware runs in: the session lives in `c.var.session`. */
export type CsrfEnv = {
  Variables: {
    session?: CsrfSession
  }
}

/** Produces a fresh token. Swappable for deterministic tests. */
export type TokenGenerator = () => string

/** Called instead of the wrapped application when a request is rejected. */
export type BlockedHandler = (c: Context<CsrfEnv>) => Response | Promise<Response>

/** Finds the session for a request, or `undefined` when none is available. */
export type SessionResolver = (c: Context<CsrfEnv>) => CsrfSession | undefined
