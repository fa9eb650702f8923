// src/csrf/errors.ts — Typed CSRF middleware errors

/** Error codes for deployment-time misconfiguration */
export type CsrfErrorCode =
  | "SESSION_REQUIRED"
  | "CONFIG_INVALID"

/**
 * Raised when the middleware cannot run at all: bad options at construction,
 * or no session facility in front of it. Never turned into a 403.
 */
export class CsrfConfigurationError extends Error {
  readonly name = "CsrfConfigurationError"
  readonly code: CsrfErrorCode
  readonly context: Record<string, unknown>

  constructor(code: CsrfErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(`[csrf] ${code}: ${message}`)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}
