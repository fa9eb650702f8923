// src/csrf/config.ts — Middleware options and their one-time resolution

import { CsrfConfigurationError } from "./errors.js"
import { DEFAULT_MAX_MARKUP_LENGTH } from "./html-scanner.js"
import { createCsrfLogger } from "./logger.js"
import type { CsrfLogger } from "./logger.js"
import { DEFAULT_TOKEN_LENGTH, assertTokenLength, createTokenGenerator } from "./token.js"
import type { BlockedHandler, SessionResolver, TokenGenerator } from "./types.js"

export interface CsrfBlockOptions {
  /** Form field carrying the token. Default "SEC" */
  parameterName?: string
  /** Request header carrying the token. Default "X-CSRF-Token" */
  headerName?: string
  /** Token length, 1..40. Default 16 */
  tokenLength?: number
  /** Session slot holding the token. Default "csrfblock.token" */
  sessionKey?: string
  /** Also put the token in `<meta name={metaName}>` inside `<head>`. Default false */
  addMeta?: boolean
  /** Default "csrftoken" */
  metaName?: string
  /** Response for rejected requests. Default: 403 "CSRF detected" */
  blocked?: BlockedHandler
  /** Drop the token after each successful check. Default false */
  onetime?: boolean
  /** Replaces the built-in generator; `tokenLength` is then not applied. */
  tokenGenerator?: TokenGenerator
  /** Default: `c.get("session")` */
  getSession?: SessionResolver
  logger?: CsrfLogger
  maxMarkupLength?: number
}

export interface ResolvedCsrfConfig {
  readonly parameterName: string
  /** Lowercased, as the Fetch transport presents header names */
  readonly headerName: string
  readonly tokenLength: number
  readonly sessionKey: string
  readonly addMeta: boolean
  readonly metaName: string
  readonly blocked: BlockedHandler | undefined
  readonly onetime: boolean
  readonly tokenGenerator: TokenGenerator
  readonly getSession: SessionResolver
  readonly logger: CsrfLogger
  readonly maxMarkupLength: number
}

export const CSRF_DEFAULTS = {
  parameterName: "SEC",
  headerName: "X-CSRF-Token",
  tokenLength: DEFAULT_TOKEN_LENGTH,
  sessionKey: "csrfblock.token",
  metaName: "csrftoken",
} as const

/** RFC 9110 field-name token characters */
const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/
/** Printable ASCII; injected names stay plain ASCII on the wire */
const PRINTABLE_ASCII = /^[\x20-\x7e]+$/

function requireName(option: string, value: string): string {
  if (!PRINTABLE_ASCII.test(value)) {
    throw new CsrfConfigurationError(
      "CONFIG_INVALID",
      `${option} must be a non-empty printable ASCII string (got "${value}")`,
      { option },
    )
  }
  return value
}

function requireNonEmpty(option: string, value: string): string {
  if (value.length === 0) {
    throw new CsrfConfigurationError("CONFIG_INVALID", `${option} must not be empty`, { option })
  }
  return value
}

/** Header names are normalized once here, never per request. */
export function normalizeHeaderName(name: string): string {
  const trimmed = name.trim()
  if (!HEADER_NAME_PATTERN.test(trimmed)) {
    throw new CsrfConfigurationError(
      "CONFIG_INVALID",
      `headerName must be a valid HTTP header name (got "${name}")`,
      { option: "headerName" },
    )
  }
  return trimmed.toLowerCase()
}

const defaultGetSession: SessionResolver = (c) => c.get("session")

/** Validates options and fills defaults. Throws CsrfConfigurationError on bad input. */
export function resolveCsrfConfig(options: CsrfBlockOptions = {}): ResolvedCsrfConfig {
  const tokenLength = options.tokenLength ?? CSRF_DEFAULTS.tokenLength
  assertTokenLength(tokenLength)

  const maxMarkupLength = options.maxMarkupLength ?? DEFAULT_MAX_MARKUP_LENGTH
  if (!Number.isInteger(maxMarkupLength) || maxMarkupLength < 1) {
    throw new CsrfConfigurationError(
      "CONFIG_INVALID",
      `maxMarkupLength must be a positive integer (got ${maxMarkupLength})`,
      { option: "maxMarkupLength" },
    )
  }

  return Object.freeze({
    parameterName: requireName("parameterName", options.parameterName ?? CSRF_DEFAULTS.parameterName),
    headerName: normalizeHeaderName(options.headerName ?? CSRF_DEFAULTS.headerName),
    tokenLength,
    sessionKey: requireNonEmpty("sessionKey", options.sessionKey ?? CSRF_DEFAULTS.sessionKey),
    addMeta: options.addMeta ?? false,
    metaName: requireName("metaName", options.metaName ?? CSRF_DEFAULTS.metaName),
    blocked: options.blocked,
    onetime: options.onetime ?? false,
    tokenGenerator: options.tokenGenerator ?? createTokenGenerator(tokenLength),
    getSession: options.getSession ?? defaultGetSession,
    logger: options.logger ?? createCsrfLogger(),
    maxMarkupLength,
  })
}
