// src/csrf/html-scanner.ts — Incremental start-tag scanner
//
// Splits an HTML character stream into text, start tags and other markup
// without building a tree. Chunks may end anywhere (mid-tag, mid-attribute,
// mid-quote); the only state carried between chunks is the unfinished
// construct in `pending` and the raw-text element we are inside, if any.
//
// Concatenating the `text` of every emitted token reproduces the input
// exactly, and the token sequence does not depend on how the input was split.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TagAttribute {
  /** Attribute name as written */
  name: string
  /** Entity-decoded value, or null for a bare attribute (`<input disabled>`) */
  value: string | null
}

export interface StartTag {
  /** ASCII-lowercased tag name */
  name: string
  /** Attributes in source order */
  attributes: TagAttribute[]
}

export type MarkupToken =
  | { kind: "text"; text: string }
  | { kind: "start"; text: string; tag: StartTag }
  | { kind: "markup"; text: string }

export interface HtmlScannerOptions {
  /** Longest construct (from `<`) still treated as markup. Longer ones become text. */
  maxMarkupLength?: number
}

export const DEFAULT_MAX_MARKUP_LENGTH = 256 * 1024

/** Elements whose content is text up to the matching end tag. */
const RAW_TEXT_ELEMENTS = new Set([
  "script",
  "style",
  "textarea",
  "title",
  "xmp",
  "iframe",
  "noembed",
  "noframes",
])

// ---------------------------------------------------------------------------
// Character helpers
// ---------------------------------------------------------------------------

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f"
}

function isAsciiAlpha(ch: string): boolean {
  const code = ch.charCodeAt(0)
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a)
}

/** Lowercases A-Z only, so string length and indices never shift. */
export function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32))
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
}

/** Decodes the character references that matter for attribute comparisons. */
export function decodeEntities(value: string): string {
  if (!value.includes("&")) return value
  return value.replace(/&(#[xX][0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (match, ref: string) => {
    if (ref.startsWith("#")) {
      const code = ref[1] === "x" || ref[1] === "X" ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10)
      return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match
    }
    return NAMED_ENTITIES[asciiLower(ref)] ?? match
  })
}

/** Case-insensitive attribute lookup. The first occurrence wins. */
export function getAttribute(tag: StartTag, name: string): string | null | undefined {
  const wanted = asciiLower(name)
  for (const attr of tag.attributes) {
    if (asciiLower(attr.name) === wanted) return attr.value
  }
  return undefined
}

// ---------------------------------------------------------------------------
// Construct scanners
//
// Each takes the buffer and the index of a `<` and returns the parsed
// construct, INCOMPLETE when the buffer ends before it can be decided, or
// NOT_MARKUP when the `<` is plain text.
// ---------------------------------------------------------------------------

const INCOMPLETE = "incomplete"
const NOT_MARKUP = "not_markup"

type ScanResult =
  | { end: number; token: MarkupToken }
  | typeof INCOMPLETE
  | typeof NOT_MARKUP

function scanStartTag(buf: string, pos: number): ScanResult {
  const len = buf.length
  let i = pos + 1
  while (i < len && !isWhitespace(buf[i]) && buf[i] !== "/" && buf[i] !== ">") i++
  if (i >= len) return INCOMPLETE
  const name = asciiLower(buf.slice(pos + 1, i))
  const attributes: TagAttribute[] = []

  for (;;) {
    while (i < len && (isWhitespace(buf[i]) || buf[i] === "/")) i++
    if (i >= len) return INCOMPLETE
    if (buf[i] === ">") {
      return { end: i + 1, token: { kind: "start", text: buf.slice(pos, i + 1), tag: { name, attributes } } }
    }

    // Attribute name; a leading "=" belongs to the name
    const nameStart = i
    if (buf[i] === "=") i++
    while (i < len && !isWhitespace(buf[i]) && buf[i] !== "/" && buf[i] !== ">" && buf[i] !== "=") i++
    if (i >= len) return INCOMPLETE
    const attrName = buf.slice(nameStart, i)

    let j = i
    while (j < len && isWhitespace(buf[j])) j++
    if (j >= len) return INCOMPLETE
    if (buf[j] !== "=") {
      attributes.push({ name: attrName, value: null })
      i = j
      continue
    }

    j++
    while (j < len && isWhitespace(buf[j])) j++
    if (j >= len) return INCOMPLETE

    const quote = buf[j]
    let raw: string
    if (quote === "\"" || quote === "'") {
      const close = buf.indexOf(quote, j + 1)
      if (close === -1) return INCOMPLETE
      raw = buf.slice(j + 1, close)
      i = close + 1
    } else {
      const valueStart = j
      while (j < len && !isWhitespace(buf[j]) && buf[j] !== ">") j++
      if (j >= len) return INCOMPLETE
      raw = buf.slice(valueStart, j)
      i = j
    }
    attributes.push({ name: attrName, value: decodeEntities(raw) })
  }
}

/** Finds `terminator` at or after `from` and returns a plain markup token ending there. */
function scanUntil(buf: string, pos: number, from: number, terminator: string): ScanResult {
  const idx = buf.indexOf(terminator, from)
  if (idx === -1) return INCOMPLETE
  const end = idx + terminator.length
  return { end, token: { kind: "markup", text: buf.slice(pos, end) } }
}

function scanMarkup(buf: string, pos: number): ScanResult {
  const len = buf.length
  if (pos + 1 >= len) return INCOMPLETE
  const next = buf[pos + 1]

  if (isAsciiAlpha(next)) return scanStartTag(buf, pos)

  if (next === "/") {
    if (pos + 2 >= len) return INCOMPLETE
    return isAsciiAlpha(buf[pos + 2]) ? scanUntil(buf, pos, pos + 2, ">") : NOT_MARKUP
  }

  if (next === "!") {
    const available = buf.slice(pos, pos + 4)
    if (available === "<!--") return scanUntil(buf, pos, pos + 4, "-->")
    if (available.length < 4 && "<!--".startsWith(available)) return INCOMPLETE
    return scanUntil(buf, pos, pos + 2, ">")
  }

  if (next === "?") return scanUntil(buf, pos, pos + 2, ">")

  return NOT_MARKUP
}

/**
 * Inside a raw-text element: returns where its text ends and whether the
 * closing `</name` was confirmed. An unconfirmed tail that could still grow
 * into the end tag is left unconsumed.
 */
function scanRawText(buf: string, pos: number, element: string): { textEnd: number; closed: boolean } {
  const lower = asciiLower(buf)
  const needle = `</${element}`
  let from = pos

  for (;;) {
    const idx = lower.indexOf(needle, from)
    if (idx === -1) break
    const after = idx + needle.length
    if (after >= buf.length) return { textEnd: idx, closed: false }
    const ch = buf[after]
    if (isWhitespace(ch) || ch === "/" || ch === ">") return { textEnd: idx, closed: true }
    from = idx + 1
  }

  for (let k = Math.max(pos, buf.length - needle.length + 1); k < buf.length; k++) {
    if (needle.startsWith(lower.slice(k))) return { textEnd: k, closed: false }
  }
  return { textEnd: buf.length, closed: false }
}

// ---------------------------------------------------------------------------
// HtmlScanner
// ---------------------------------------------------------------------------

/**
 * An unfinished construct is rescanned from its `<` only when a chunk brings
 * a `>` (every construct ends on one) or the construct outgrows
 * `maxMarkupLength`, so a long tag arriving in small chunks costs one scan
 * per `>` rather than one per chunk.
 */
export class HtmlScanner {
  private pending = ""
  private rawTextElement: string | null = null
  /** `pending` holds a construct past its first 4 chars that only a `>` can finish */
  private awaitingClose = false
  private readonly maxMarkupLength: number

  constructor(options?: HtmlScannerOptions) {
    this.maxMarkupLength = options?.maxMarkupLength ?? DEFAULT_MAX_MARKUP_LENGTH
  }

  /** Feed the next chunk; returns every token that can be decided so far. */
  write(chunk: string): MarkupToken[] {
    const resumeAt = this.pending.length
    this.pending += chunk
    if (
      this.awaitingClose &&
      this.pending.length <= this.maxMarkupLength &&
      !this.pending.includes(">", resumeAt)
    ) {
      return []
    }
    return this.drain()
  }

  /** No more input: whatever is still pending is emitted as literal text. */
  end(): MarkupToken[] {
    const tokens = this.drain()
    if (this.pending) {
      tokens.push({ kind: "text", text: this.pending })
      this.pending = ""
    }
    this.rawTextElement = null
    this.awaitingClose = false
    return tokens
  }

  private drain(): MarkupToken[] {
    const buf = this.pending
    const tokens: MarkupToken[] = []
    let pos = 0
    this.awaitingClose = false

    while (pos < buf.length) {
      if (this.rawTextElement !== null) {
        const { textEnd, closed } = scanRawText(buf, pos, this.rawTextElement)
        if (textEnd > pos) tokens.push({ kind: "text", text: buf.slice(pos, textEnd) })
        pos = textEnd
        if (!closed) break
        this.rawTextElement = null
        continue
      }

      const lt = buf.indexOf("<", pos)
      if (lt === -1) {
        tokens.push({ kind: "text", text: buf.slice(pos) })
        pos = buf.length
        break
      }
      if (lt > pos) {
        tokens.push({ kind: "text", text: buf.slice(pos, lt) })
        pos = lt
      }

      const result = scanMarkup(buf, pos)
      if (result === INCOMPLETE) {
        if (buf.length - pos <= this.maxMarkupLength) {
          // "<", "</", "<!" and "<!-" can still turn into text without a ">"
          this.awaitingClose = buf.length - pos >= 4
          break
        }
        tokens.push({ kind: "text", text: "<" })
        pos += 1
        continue
      }
      if (result === NOT_MARKUP || result.end - pos > this.maxMarkupLength) {
        tokens.push({ kind: "text", text: "<" })
        pos += 1
        continue
      }

      tokens.push(result.token)
      pos = result.end
      if (result.token.kind === "start" && RAW_TEXT_ELEMENTS.has(result.token.tag.name)) {
        this.rawTextElement = result.token.tag.name
      }
    }

    this.pending = buf.slice(pos)
    return tokens
  }
}
