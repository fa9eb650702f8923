// src/csrf/validator.ts — Token check for state-changing requests

import { createHash, timingSafeEqual } from "node:crypto"
import type { TokenStore } from "./token-store.js"
import type { CsrfSession } from "./types.js"

// ── Types ────────────────────────────────────────────────────

/** What the validator needs to know about a request. */
export interface CsrfRequest {
  method: string
  /** Header lookup; names are case-insensitive. */
  header(name: string): string | undefined
  /** Form parameter from the parsed body, falling back to the query string. */
  param(name: string): Promise<string | undefined>
}

export type RejectReason = "token_missing" | "token_mismatch"

export type ValidationResult =
  | { accepted: true; via?: "header" | "parameter" }
  | { accepted: false; reason: RejectReason }

export interface RequestValidatorConfig {
  store: TokenStore
  headerName: string
  parameterName: string
  onetime: boolean
}

// ── Timing-safe comparison ───────────────────────────────────

/** Timing-safe string comparison via SHA-256 digest (constant-time even for different lengths). */
function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

// ── RequestValidator ─────────────────────────────────────────

/**
 * Decides whether a request may reach the application.
 *
 * Only POST is checked. The header is tried first so AJAX callers never
 * force a body parse; the form parameter second. With `onetime`, the slot is
 * cleared after a successful match and only then, so failed attempts cannot
 * burn a token that is still valid.
 */
export class RequestValidator {
  constructor(private readonly config: RequestValidatorConfig) {}

  async validate(req: CsrfRequest, session: CsrfSession): Promise<ValidationResult> {
    if (req.method.toUpperCase() !== "POST") {
      return { accepted: true }
    }

    const token = this.config.store.get(session)
    if (token === undefined) {
      return { accepted: false, reason: "token_missing" }
    }

    let via: "header" | "parameter" | undefined
    if (safeCompare(req.header(this.config.headerName) ?? "", token)) {
      via = "header"
    } else if (safeCompare((await req.param(this.config.parameterName)) ?? "", token)) {
      via = "parameter"
    }

    if (via === undefined) {
      return { accepted: false, reason: "token_mismatch" }
    }

    if (this.config.onetime) {
      this.config.store.clear(session)
    }
    return { accepted: true, via }
  }
}
