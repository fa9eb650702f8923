// src/csrf/index.ts — Barrel export

export { csrfBlock, blockedResponse, toCsrfRequest } from "./middleware.js"
export { resolveCsrfConfig, normalizeHeaderName, CSRF_DEFAULTS } from "./config.js"
export { CsrfConfigurationError } from "./errors.js"
export { createCsrfLogger } from "./logger.js"
export { createTokenGenerator, DEFAULT_TOKEN_LENGTH, MAX_TOKEN_LENGTH } from "./token.js"
export { TokenStore } from "./token-store.js"
export { RequestValidator } from "./validator.js"
export {
  FormInjector,
  createInjectorStream,
  isHtmlContentType,
  isSameOriginAction,
  shouldInjectIntoForm,
} from "./form-injector.js"
export { HtmlScanner, getAttribute } from "./html-scanner.js"

export type { CsrfBlockOptions, ResolvedCsrfConfig } from "./config.js"
export type { CsrfErrorCode } from "./errors.js"
export type { CsrfLogger, CsrfLogEvent, CsrfLogEntry } from "./logger.js"
export type { CsrfRequest, ValidationResult, RejectReason } from "./validator.js"
export type { FormInjectorOptions, TokenProvider } from "./form-injector.js"
export type { MarkupToken, StartTag, TagAttribute } from "./html-scanner.js"
export type { CsrfSession, CsrfEnv, TokenGenerator, BlockedHandler, SessionResolver } from "./types.js"
