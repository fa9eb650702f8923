// src/session/memory-session.ts — In-memory cookie sessions
//
// Minimal session layer for the demo server and tests: a cookie-keyed Map of
// per-session Maps, evicted after an idle period. Not shared across
// processes; production deployments bring their own session store.

import { randomBytes } from "node:crypto"
import type { MiddlewareHandler } from "hono"
import { getCookie, setCookie } from "hono/cookie"
import type { CsrfEnv, CsrfSession } from "../csrf/types.js"

export interface MemorySessionOptions {
  cookieName?: string
  /** Idle time after which a session is dropped. Default 30 minutes */
  idleMs?: number
  maxSessions?: number
  /** Mark the cookie Secure (HTTPS deployments) */
  secure?: boolean
  now?: () => number
}

interface ManagedSession {
  session: MemorySession
  lastActivity: number
}

const DEFAULT_IDLE_MS = 30 * 60 * 1000
const DEFAULT_MAX_SESSIONS = 10_000
const SWEEP_INTERVAL_MS = 60_000

export class MemorySession implements CsrfSession {
  private readonly values = new Map<string, unknown>()

  get(key: string): unknown {
    return this.values.get(key)
  }

  set(key: string, value: string): void {
    this.values.set(key, value)
  }

  delete(key: string): void {
    this.values.delete(key)
  }
}

export class MemorySessionStore {
  readonly cookieName: string
  readonly secure: boolean
  private readonly idleMs: number
  private readonly maxSessions: number
  private readonly now: () => number
  private readonly sessions = new Map<string, ManagedSession>()
  private lastSweep: number

  constructor(options?: MemorySessionOptions) {
    this.cookieName = options?.cookieName ?? "sid"
    this.secure = options?.secure ?? false
    this.idleMs = options?.idleMs ?? DEFAULT_IDLE_MS
    this.maxSessions = options?.maxSessions ?? DEFAULT_MAX_SESSIONS
    this.now = options?.now ?? Date.now
    this.lastSweep = this.now()
  }

  /** Session for `id`, or a new one when the id is unknown or expired. */
  load(id: string | undefined): { id: string; session: MemorySession; created: boolean } {
    const now = this.now()
    if (now - this.lastSweep >= SWEEP_INTERVAL_MS) this.evictIdle()

    const managed = id !== undefined ? this.sessions.get(id) : undefined
    if (id !== undefined && managed && now - managed.lastActivity < this.idleMs) {
      managed.lastActivity = now
      return { id, session: managed.session, created: false }
    }
    if (id !== undefined && managed) this.sessions.delete(id)

    if (this.sessions.size >= this.maxSessions) {
      this.evictIdle()
      if (this.sessions.size >= this.maxSessions) this.evictOldest()
    }

    const newId = randomBytes(24).toString("base64url")
    const session = new MemorySession()
    this.sessions.set(newId, { session, lastActivity: now })
    return { id: newId, session, created: true }
  }

  get size(): number {
    return this.sessions.size
  }

  /** Drop sessions idle longer than `idleMs`. Returns count evicted. */
  evictIdle(): number {
    const now = this.now()
    this.lastSweep = now
    let evicted = 0
    for (const [id, managed] of this.sessions) {
      if (now - managed.lastActivity >= this.idleMs) {
        this.sessions.delete(id)
        evicted++
      }
    }
    return evicted
  }

  private evictOldest(): void {
    let oldestId: string | undefined
    let oldest = Infinity
    for (const [id, managed] of this.sessions) {
      if (managed.lastActivity < oldest) {
        oldest = managed.lastActivity
        oldestId = id
      }
    }
    if (oldestId !== undefined) this.sessions.delete(oldestId)
  }
}

/** Puts the session on `c.var.session`; issues the cookie for new sessions. */
export function createMemorySessionMiddleware(store: MemorySessionStore): MiddlewareHandler<CsrfEnv> {
  return async (c, next) => {
    const { id, session, created } = store.load(getCookie(c, store.cookieName))
    c.set("session", session)

    await next()

    if (created) {
      setCookie(c, store.cookieName, id, {
        path: "/",
        httpOnly: true,
        sameSite: "Lax",
        secure: store.secure,
      })
    }
  }
}
