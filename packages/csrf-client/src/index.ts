// packages/csrf-client/src/index.ts — Barrel Export

export { CsrfClient, CsrfClientError, readMetaToken } from "./client.js"

export type { CsrfClientConfig, CsrfClientErrorCode, MetaSource } from "./types.js"
