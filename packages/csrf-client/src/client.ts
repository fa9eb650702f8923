// packages/csrf-client/src/client.ts — CsrfClient
//
// Pages rendered through csrfBlock({ addMeta: true }) carry the session
// token in <meta name="csrftoken">. Forms get it for free; fetch() calls do
// not, so this client copies it into the X-CSRF-Token header.

import type { CsrfClientConfig, CsrfClientErrorCode, MetaSource } from "./types.js"

const DEFAULT_HEADER_NAME = "X-CSRF-Token"
const DEFAULT_META_NAME = "csrftoken"
const BLOCKED_BODY = "CSRF detected"

/** Content of `<meta name={metaName}>`, or null when absent or empty. */
export function readMetaToken(doc: MetaSource, metaName: string = DEFAULT_META_NAME): string | null {
  const escaped = metaName.replace(/["\\]/g, "\\$&")
  const element = doc.querySelector(`meta[name="${escaped}"]`)
  return element?.getAttribute("content") || null
}

function defaultDocument(): MetaSource | undefined {
  if (typeof document === "undefined") return undefined
  return document
}

// ---------------------------------------------------------------------------
// CsrfClient
// ---------------------------------------------------------------------------

export class CsrfClient {
  private readonly baseUrl: string
  private readonly headerName: string
  private readonly metaName: string
  private readonly document?: MetaSource
  private explicitToken?: string
  private readonly _fetch: typeof globalThis.fetch

  constructor(config: CsrfClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? "").replace(/\/$/, "")
    this.headerName = config.headerName ?? DEFAULT_HEADER_NAME
    this.metaName = config.metaName ?? DEFAULT_META_NAME
    this.document = config.document ?? defaultDocument()
    this.explicitToken = config.token
    this._fetch = config.fetch ?? globalThis.fetch
  }

  /** Current token: the explicit one if set, else the page's meta tag. */
  get token(): string | null {
    if (this.explicitToken) return this.explicitToken
    return this.document ? readMetaToken(this.document, this.metaName) : null
  }

  /** Use a token obtained elsewhere (e.g. after a one-time token was rotated). */
  setToken(token: string): void {
    this.explicitToken = token
  }

  /** POST a JSON body with the token header; resolves to the parsed JSON response. */
  async postJson<T>(path: string, body: unknown): Promise<T> {
    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: this.buildHeaders({ "Content-Type": "application/json" }),
      body: JSON.stringify(body),
    })

    if (!res.ok) {
      await this.throwApiError(res)
    }

    return res.json() as Promise<T>
  }

  /** POST url-encoded form fields with the token header. */
  async postForm(path: string, fields: Record<string, string>): Promise<Response> {
    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: this.buildHeaders({ "Content-Type": "application/x-www-form-urlencoded" }),
      body: new URLSearchParams(fields).toString(),
    })

    if (!res.ok) {
      await this.throwApiError(res)
    }

    return res
  }

  // -------------------------------------------------------------------------
  // Internal Helpers
  // -------------------------------------------------------------------------

  private buildHeaders(base: Record<string, string>): Record<string, string> {
    const token = this.token
    if (!token) {
      throw new CsrfClientError(
        `No CSRF token: set one explicitly or render <meta name="${this.metaName}">`,
        "TOKEN_UNAVAILABLE",
        0,
      )
    }
    return { ...base, [this.headerName]: token }
  }

  private async throwApiError(res: Response): Promise<never> {
    const text = await res.text()
    if (res.status === 403 && text === BLOCKED_BODY) {
      throw new CsrfClientError("Request rejected by CSRF protection", "CSRF_REJECTED", res.status)
    }
    throw new CsrfClientError(text || `HTTP ${res.status}`, "HTTP_ERROR", res.status)
  }
}

// ---------------------------------------------------------------------------
// Error Class
// ---------------------------------------------------------------------------

export class CsrfClientError extends Error {
  readonly code: CsrfClientErrorCode
  readonly status: number

  constructor(message: string, code: CsrfClientErrorCode, status: number) {
    super(message)
    this.name = "CsrfClientError"
    this.code = code
    this.status = status
  }
}
