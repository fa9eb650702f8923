// src/gateway/server.ts — Demo Hono app protected by csrfBlock

import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { Hono } from "hono"
import type { AppConfig } from "../config.js"
import { csrfBlock } from "../csrf/middleware.js"
import type { CsrfLogger } from "../csrf/logger.js"
import type { CsrfEnv, TokenGenerator } from "../csrf/types.js"
import { MemorySessionStore, createMemorySessionMiddleware } from "../session/memory-session.js"

export interface AppOptions {
  sessionStore?: MemorySessionStore
  logger?: CsrfLogger
  tokenGenerator?: TokenGenerator
}

const INDEX_PAGE = fileURLToPath(new URL("../../public/index.html", import.meta.url))

export function createApp(config: AppConfig, options: AppOptions = {}) {
  const app = new Hono<CsrfEnv>()
  const sessions = options.sessionStore ?? new MemorySessionStore(config.session)

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      uptime: process.uptime(),
      sessions: { active: sessions.size },
    }),
  )

  // Everything below runs with a session and the CSRF check
  app.use("*", createMemorySessionMiddleware(sessions))
  app.use(
    "*",
    csrfBlock({
      ...config.csrf,
      logger: options.logger,
      tokenGenerator: options.tokenGenerator,
    }),
  )

  // Application routes know nothing about CSRF
  app.get("/", async (c) => {
    try {
      return c.html(await readFile(INDEX_PAGE, "utf-8"))
    } catch {
      return c.text("Demo page not found. Place index.html in public/.", 404)
    }
  })

  app.post("/submit", async (c) => {
    const body = await c.req.parseBody()
    const message = typeof body.message === "string" ? body.message : ""
    return c.text(`received: ${message}`)
  })

  app.get("/search", (c) => c.text(`results for: ${c.req.query("q") ?? ""}`))

  app.post("/api/echo", async (c) => {
    const body = await c.req.json<{ message?: string }>()
    return c.json({ received: body.message ?? null })
  })

  return app
}
