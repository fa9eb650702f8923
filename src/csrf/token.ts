// src/csrf/token.ts — Session token generation

import { createHash, randomBytes } from "node:crypto"
import { CsrfConfigurationError } from "./errors.js"
import type { TokenGenerator } from "./types.js"

export const DEFAULT_TOKEN_LENGTH = 16
/** Hex SHA-1 digest length; tokens are truncated digests. */
export const MAX_TOKEN_LENGTH = 40

export function assertTokenLength(length: number): void {
  if (!Number.isInteger(length) || length < 1 || length > MAX_TOKEN_LENGTH) {
    throw new CsrfConfigurationError(
      "CONFIG_INVALID",
      `tokenLength must be an integer between 1 and ${MAX_TOKEN_LENGTH} (got ${length})`,
      { tokenLength: length },
    )
  }
}

/**
 * Token generator truncating a SHA-1 hex digest of random bytes, the process
 * id and the current time. Not a signed credential; it only has to be hard to
 * guess while the session holds it.
 */
export function createTokenGenerator(length: number = DEFAULT_TOKEN_LENGTH): TokenGenerator {
  assertTokenLength(length)

  return () =>
    createHash("sha1")
      .update(randomBytes(20))
      .update(String(process.pid))
      .update(process.hrtime.bigint().toString())
      .update(String(Date.now()))
      .digest("hex")
      .slice(0, length)
}
