/**
 * Loopwright ACP public API barrel.
 *
 * The Session Adapter is the orchestrator-facing entry point; the client,
 * codec and callback handlers are exported for embedding and testing.
 * @module
 */

export * from "./adapters/acp/index.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { adapterConfigSchema, PERMISSION_MODES, permissionModeSchema } from "./config/config-schema.js";
export {
  AcpClientError,
  AcpHandshakeError,
  AcpRequestError,
  AcpTimeoutError,
  ConfigurationError,
  errorMessage,
  JsonRpcParseError,
  type JsonRpcParseFailure,
  LoopwrightError,
  toLoopwrightError,
} from "./errors.js";
export type { Logger } from "./interfaces/logger.js";
export type { AdapterConfig, PermissionMode, ResolvedAdapterConfig } from "./types/config.js";
export {
  adapterConfigFromEnv,
  DEFAULT_ADAPTER_CONFIG,
  resolveAdapterConfig,
} from "./types/config.js";
export { NDJSONLineBuffer } from "./utils/ndjson.js";
export { noopLogger } from "./utils/noop-logger.js";
export { RingBuffer } from "./utils/ring-buffer.js";
