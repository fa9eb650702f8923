// src/csrf/middleware.ts — csrfBlock() Hono middleware
//
// Request side: POSTs must carry the session token (header or form field).
// Response side: HTML bodies are streamed through FormInjector so every
// same-origin POST form carries the token back. The wrapped application
// needs no changes.

import { Buffer } from "node:buffer"
import type { Context, MiddlewareHandler } from "hono"
import { resolveCsrfConfig } from "./config.js"
import type { CsrfBlockOptions } from "./config.js"
import { CsrfConfigurationError } from "./errors.js"
import { FormInjector, createInjectorStream, isHtmlContentType } from "./form-injector.js"
import { asciiLower } from "./html-scanner.js"
import { TokenStore } from "./token-store.js"
import { RequestValidator } from "./validator.js"
import type { CsrfRequest } from "./validator.js"
import type { CsrfEnv } from "./types.js"

const BLOCKED_BODY = "CSRF detected"

const FORM_CONTENT_TYPES = ["application/x-www-form-urlencoded", "multipart/form-data"]

/** Default rejection: 403, plain text, explicit Content-Length. */
export function blockedResponse(): Response {
  return new Response(BLOCKED_BODY, {
    status: 403,
    headers: {
      "Content-Type": "text/plain",
      "Content-Length": String(Buffer.byteLength(BLOCKED_BODY)),
    },
  })
}

/**
 * Request facade over a Hono context. The body is parsed only for the two
 * form encodings, and only when asked for; Hono caches the parsed body so
 * the application can still read it.
 */
export function toCsrfRequest(c: Context<CsrfEnv>): CsrfRequest {
  return {
    method: c.req.method,
    header: (name) => c.req.header(name),
    param: async (name) => {
      const contentType = asciiLower(c.req.header("content-type") ?? "")
      if (FORM_CONTENT_TYPES.some((type) => contentType.startsWith(type))) {
        const body = await c.req.parseBody()
        const value = body[name]
        if (typeof value === "string") return value
      }
      return c.req.query(name)
    },
  }
}

/**
 * CSRF protection for server-rendered HTML apps.
 *
 * Needs a session in front of it (`c.get("session")` by default, see
 * `getSession`). A missing session is a deployment error and throws.
 */
export function csrfBlock(options?: CsrfBlockOptions): MiddlewareHandler<CsrfEnv> {
  const config = resolveCsrfConfig(options)
  const store = new TokenStore(config.sessionKey)
  const validator = new RequestValidator({
    store,
    headerName: config.headerName,
    parameterName: config.parameterName,
    onetime: config.onetime,
  })
  const { logger } = config

  return async (c, next) => {
    const session = config.getSession(c)
    if (!session) {
      throw new CsrfConfigurationError(
        "SESSION_REQUIRED",
        "no session on the request context; mount a session middleware before csrfBlock",
        { path: c.req.path },
      )
    }

    const result = await validator.validate(toCsrfRequest(c), session)
    if (!result.accepted) {
      logger.warn("request_rejected", { method: c.req.method, path: c.req.path, reason: result.reason })
      return config.blocked ? config.blocked(c) : blockedResponse()
    }
    if (result.via !== undefined && config.onetime) {
      logger.info("token_consumed", { path: c.req.path, via: result.via })
    }

    await next()

    const res = c.res
    if (!res.body || !isHtmlContentType(res.headers.get("Content-Type"))) return

    if (res.headers.has("Content-Encoding")) {
      logger.warn("rewrite_skipped", {
        path: c.req.path,
        contentEncoding: res.headers.get("Content-Encoding"),
      })
      return
    }

    // Materialized before the body streams, while session layers that
    // persist on the way out can still see the write.
    const { token, created } = store.ensure(session, config.tokenGenerator)
    if (created) {
      logger.info("token_issued", { path: c.req.path })
    }

    const url = new URL(c.req.url)
    const injector = new FormInjector({
      parameterName: config.parameterName,
      token: () => token,
      host: c.req.header("Host") ?? url.host,
      scheme: url.protocol,
      addMeta: config.addMeta,
      metaName: config.metaName,
      maxMarkupLength: config.maxMarkupLength,
    })

    c.res = new Response(res.body.pipeThrough(createInjectorStream(injector)), res)
    c.res.headers.delete("Content-Length")
  }
}
