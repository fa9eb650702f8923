// src/csrf/token-store.ts — Token slot inside the external session

import type { CsrfSession, TokenGenerator } from "./types.js"

/**
 * Get/set/clear of a single named slot. No persistence of its own: whatever
 * the session throws reaches the caller as-is.
 */
export class TokenStore {
  constructor(readonly sessionKey: string) {}

  /** Stored token, or `undefined` when the slot is empty or holds something else. */
  get(session: CsrfSession): string | undefined {
    const value = session.get(this.sessionKey)
    return typeof value === "string" && value.length > 0 ? value : undefined
  }

  set(session: CsrfSession, token: string): void {
    session.set(this.sessionKey, token)
  }

  clear(session: CsrfSession): void {
    session.delete(this.sessionKey)
  }

  /** Returns the stored token, creating and storing one first if the slot is empty. */
  ensure(session: CsrfSession, generate: TokenGenerator): { token: string; created: boolean } {
    const existing = this.get(session)
    if (existing !== undefined) return { token: existing, created: false }

    const token = generate()
    this.set(session, token)
    return { token, created: true }
  }
}
