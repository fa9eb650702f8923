// src/csrf/logger.ts — Structured CSRF logger
//
// JSON lines on the console. Token values are never passed in.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CsrfLogEvent =
  | "request_rejected"
  | "token_issued"
  | "token_consumed"
  | "rewrite_skipped"

export interface CsrfLogEntry {
  timestamp: string
  level: "info" | "warn"
  event: CsrfLogEvent
  [key: string]: unknown
}

export interface CsrfLogger {
  info(event: CsrfLogEvent, data?: Record<string, unknown>): void
  warn(event: CsrfLogEvent, data?: Record<string, unknown>): void
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

class ConsoleCsrfLogger implements CsrfLogger {
  info(event: CsrfLogEvent, data?: Record<string, unknown>): void {
    console.log(JSON.stringify(this.entry("info", event, data)))
  }

  warn(event: CsrfLogEvent, data?: Record<string, unknown>): void {
    console.warn(JSON.stringify(this.entry("warn", event, data)))
  }

  private entry(level: CsrfLogEntry["level"], event: CsrfLogEvent, data?: Record<string, unknown>): CsrfLogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...(data ?? {}),
    }
  }
}

/** Default logger: one JSON line per event on console.log / console.warn. */
export function createCsrfLogger(): CsrfLogger {
  return new ConsoleCsrfLogger()
}
