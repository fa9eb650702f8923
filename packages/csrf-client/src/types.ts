// packages/csrf-client/src/types.ts — CSRF client type definitions

/** The part of `Document` the client reads. */
export interface MetaSource {
  querySelector(selectors: string): { getAttribute(name: string): string | null } | null
}

export interface CsrfClientConfig {
  /** Prefix for request paths. Default "" (same origin) */
  baseUrl?: string
  /** Header the server checks. Default "X-CSRF-Token" */
  headerName?: string
  /** `<meta name>` the server writes the token to. Default "csrftoken" */
  metaName?: string
  /** Where to look for the meta tag. Default `globalThis.document` */
  document?: MetaSource
  /** Explicit token; skips the meta lookup */
  token?: string
  fetch?: typeof globalThis.fetch
}

export type CsrfClientErrorCode = "TOKEN_UNAVAILABLE" | "CSRF_REJECTED" | "HTTP_ERROR"
