export class LoopwrightError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LoopwrightError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConfigurationError extends LoopwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigurationError";
  }
}

export class AcpClientError extends LoopwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ACP_CLIENT", options);
    this.name = "AcpClientError";
  }
}

export class AcpHandshakeError extends LoopwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ACP_HANDSHAKE", options);
    this.name = "AcpHandshakeError";
  }
}

/** An error response received from the agent for one of our requests. */
export class AcpRequestError extends LoopwrightError {
  readonly rpcCode: number;
  readonly data: unknown;

  constructor(message: string, rpcCode: number, data?: unknown, options?: ErrorOptions) {
    super(message, "ACP_REQUEST", options);
    this.name = "AcpRequestError";
    this.rpcCode = rpcCode;
    this.data = data;
  }
}

/** A request or wait that exceeded its deadline. */
export class AcpTimeoutError extends LoopwrightError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: ErrorOptions) {
    super(message, "ACP_TIMEOUT", options);
    this.name = "AcpTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export type JsonRpcParseFailure = "empty" | "invalid_json" | "invalid_version" | "unclassifiable";

export class JsonRpcParseError extends LoopwrightError {
  readonly reason: JsonRpcParseFailure;

  constructor(message: string, reason: JsonRpcParseFailure, options?: ErrorOptions) {
    super(message, "JSONRPC_PARSE", options);
    this.name = "JsonRpcParseError";
    this.reason = reason;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to LoopwrightError (preserves cause chain). */
export function toLoopwrightError(value: unknown): LoopwrightError {
  if (value instanceof LoopwrightError) return value;
  if (value instanceof Error) return new LoopwrightError(value.message, "UNKNOWN", { cause: value });
  return new LoopwrightError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
