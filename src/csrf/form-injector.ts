// src/csrf/form-injector.ts — Streaming token injection into HTML
//
// Sits on top of HtmlScanner: every completed start tag gets one injection
// decision, everything else is passed through untouched.
//
//   <form method="post">  → tag + <input type="hidden" name=… value=… />
//   <head>  (addMeta)     → tag + <meta name=… content=…/>

import { Buffer } from "node:buffer"
import { HtmlScanner, asciiLower, getAttribute } from "./html-scanner.js"
import type { MarkupToken, StartTag } from "./html-scanner.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Supplies the token for this response. Called at most once. */
export type TokenProvider = () => string

export interface FormInjectorOptions {
  parameterName: string
  token: TokenProvider
  /** Effective request host (`Host` header, else server name), port allowed */
  host: string
  /** Request scheme, used to resolve scheme-relative actions. Default "http:" */
  scheme?: string
  addMeta?: boolean
  metaName?: string
  maxMarkupLength?: number
}

// ---------------------------------------------------------------------------
// Content type routing
// ---------------------------------------------------------------------------

/** True for `text/html` and `application/xhtml+xml` (prefix match, case-insensitive). */
export function isHtmlContentType(contentType: string | null | undefined): boolean {
  if (!contentType) return false
  const value = asciiLower(contentType.trimStart())
  return value.startsWith("text/html") || value.startsWith("application/xhtml+xml")
}

// ---------------------------------------------------------------------------
// Form match decision
// ---------------------------------------------------------------------------

/** Sentinel base for a Host header the URL parser rejects. */
const UNRESOLVABLE_BASE = "http://unresolvable-host.invalid/"

/**
 * True unless `action` points at an http(s) URL on another host or port.
 * Relative, scheme-relative (`//host/x`) and backslash forms are all
 * resolved the way a browser would before `host` (hostname plus any
 * non-default port) is compared. An action that cannot be parsed is treated
 * as foreign.
 */
export function isSameOriginAction(
  action: string | null | undefined,
  host: string,
  scheme: string = "http:",
): boolean {
  if (action === undefined || action === null) return true

  let base: URL
  try {
    base = new URL(`${scheme}//${host}/`)
  } catch {
    base = new URL(UNRESOLVABLE_BASE)
  }

  let target: URL
  try {
    target = new URL(action, base)
  } catch {
    return false
  }

  if (target.protocol !== "http:" && target.protocol !== "https:") return true
  return target.host === base.host
}

/** `<form method="post">` whose action stays on the request's host. */
export function shouldInjectIntoForm(tag: StartTag, host: string, scheme?: string): boolean {
  if (tag.name !== "form") return false
  const method = getAttribute(tag, "method")
  if (method === undefined || method === null || asciiLower(method) !== "post") return false
  return isSameOriginAction(getAttribute(tag, "action"), host, scheme)
}

// ---------------------------------------------------------------------------
// Markup
// ---------------------------------------------------------------------------

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
}

export function hiddenInputMarkup(parameterName: string, token: string): string {
  return `<input type="hidden" name="${escapeAttribute(parameterName)}" value="${escapeAttribute(token)}" />`
}

export function metaTagMarkup(metaName: string, token: string): string {
  return `<meta name="${escapeAttribute(metaName)}" content="${escapeAttribute(token)}"/>`
}

// ---------------------------------------------------------------------------
// FormInjector
// ---------------------------------------------------------------------------

/**
 * Per-response rewriting cursor. `feed()` returns the output that can be
 * decided so far; `finish()` flushes the rest, including any unterminated
 * tag as literal text. One instance per response, never shared.
 */
export class FormInjector {
  private readonly scanner: HtmlScanner
  private readonly options: FormInjectorOptions
  private token: string | undefined
  private finished = false

  constructor(options: FormInjectorOptions) {
    this.options = options
    this.scanner = new HtmlScanner({ maxMarkupLength: options.maxMarkupLength })
  }

  feed(chunk: string): string {
    if (this.finished) return ""
    return this.render(this.scanner.write(chunk))
  }

  finish(): string {
    if (this.finished) return ""
    this.finished = true
    return this.render(this.scanner.end())
  }

  private render(tokens: MarkupToken[]): string {
    let out = ""
    for (const token of tokens) {
      out += token.text
      if (token.kind === "start") out += this.injectionFor(token.tag)
    }
    return out
  }

  private injectionFor(tag: StartTag): string {
    if (shouldInjectIntoForm(tag, this.options.host, this.options.scheme)) {
      return hiddenInputMarkup(this.options.parameterName, this.currentToken())
    }
    if (tag.name === "head" && this.options.addMeta) {
      return metaTagMarkup(this.options.metaName ?? "csrftoken", this.currentToken())
    }
    return ""
  }

  private currentToken(): string {
    if (this.token === undefined) this.token = this.options.token()
    return this.token
  }
}

// ---------------------------------------------------------------------------
// Byte stream adapter
// ---------------------------------------------------------------------------

/**
 * Wraps an injector as a byte TransformStream. Bytes map 1:1 onto latin1
 * characters, so markup (always ASCII) is found in any ASCII-compatible
 * charset and every other byte, BOM included, comes out unchanged.
 * Injected markup is ASCII (names are checked at configuration time).
 */
export function createInjectorStream(injector: FormInjector): TransformStream<Uint8Array, Uint8Array> {
  const toBytes = (text: string): Uint8Array => Buffer.from(text, "latin1")

  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      const out = injector.feed(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength).toString("latin1"))
      if (out) controller.enqueue(toBytes(out))
    },
    flush(controller) {
      const out = injector.finish()
      if (out) controller.enqueue(toBytes(out))
    },
  })
}
