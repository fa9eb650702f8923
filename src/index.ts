// src/index.ts — Demo server entry point
// Boot sequence: config → app → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createApp } from "./gateway/server.js"

async function main() {
  console.log("[csrf-block] booting demo server...")

  const config = loadConfig()
  const app = createApp(config)

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[csrf-block] listening on http://${info.address}:${info.port}`)
  })

  const shutdown = (signal: string) => {
    console.log(`[csrf-block] ${signal} received, shutting down`)
    server.close((err) => {
      if (err) {
        console.error("[csrf-block] close failed:", err)
        process.exit(1)
      }
      process.exit(0)
    })
  }
  process.once("SIGINT", () => shutdown("SIGINT"))
  process.once("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((err: unknown) => {
  console.error("[csrf-block] fatal:", err)
  process.exit(1)
})
