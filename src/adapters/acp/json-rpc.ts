/**
 * JSON-RPC 2.0 codec for ACP communication.
 *
 * Message framing only: request/response/notification creation, process-wide
 * request IDs, newline-delimited JSON encoding, and shape-based classification
 * of inbound lines. No I/O.
 */

import { JsonRpcParseError } from "../../errors.js";
import { serializeNDJSON } from "../../utils/ndjson.js";

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const JsonRpcErrorCode = {
  PARSE_ERROR: -32700,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  OPERATION_TIMEOUT: -32000,
  RESOURCE_NOT_FOUND: -32001,
  INVALID_RESOURCE_STATE: -32002,
} as const;

// ---------------------------------------------------------------------------
// Message types
// ---------------------------------------------------------------------------

export type JsonRpcId = number | string;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: unknown;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcResponse | JsonRpcNotification;

/** A decoded line tagged with its shape. */
export type ClassifiedMessage =
  | { kind: "request"; message: JsonRpcRequest }
  | { kind: "response"; message: JsonRpcSuccessResponse }
  | { kind: "error"; message: JsonRpcErrorResponse }
  | { kind: "notification"; message: JsonRpcNotification };

export type ParseResult = ({ ok: true } & ClassifiedMessage) | { ok: false; error: JsonRpcParseError };

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isJsonRpcRequest(msg: JsonRpcMessage): msg is JsonRpcRequest {
  return "method" in msg && "id" in msg;
}

export function isJsonRpcResponse(msg: JsonRpcMessage): msg is JsonRpcResponse {
  return "id" in msg && !("method" in msg);
}

export function isJsonRpcErrorResponse(msg: JsonRpcMessage): msg is JsonRpcErrorResponse {
  return isJsonRpcResponse(msg) && "error" in msg;
}

export function isJsonRpcNotification(msg: JsonRpcMessage): msg is JsonRpcNotification {
  return "method" in msg && !("id" in msg);
}

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

// Shared by every codec so an id is never reused within the process.
let nextRequestId = 1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is JsonRpcId {
  return typeof value === "number" || typeof value === "string";
}

export class JsonRpcCodec {
  /** Create a request with the next process-wide ID. Returns the ID, message and wire line. */
  createRequest(method: string, params?: unknown): { id: number; raw: JsonRpcRequest; line: string } {
    const id = nextRequestId++;
    const raw: JsonRpcRequest = { jsonrpc: "2.0", id, method };
    if (params !== undefined) {
      raw.params = params;
    }
    return { id, raw, line: this.encode(raw) };
  }

  /** Create a notification (no ID, no response expected). */
  createNotification(method: string, params?: unknown): JsonRpcNotification {
    const msg: JsonRpcNotification = { jsonrpc: "2.0", method };
    if (params !== undefined) {
      msg.params = params;
    }
    return msg;
  }

  /** Create a success response echoing the request ID. `undefined` results go out as null. */
  createResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
    return { jsonrpc: "2.0", id, result: result === undefined ? null : result };
  }

  /** Create an error response echoing the request ID. */
  createErrorResponse(
    id: JsonRpcId,
    code: number,
    message: string,
    data?: unknown,
  ): JsonRpcErrorResponse {
    const error: JsonRpcErrorObject = { code, message };
    if (data !== undefined) error.data = data;
    return { jsonrpc: "2.0", id, error };
  }

  /** Encode a message as a newline-delimited JSON string. */
  encode(msg: JsonRpcMessage): string {
    return serializeNDJSON(msg);
  }

  /** Classify one line of input. Never throws. */
  parse(line: string): ParseResult {
    const trimmed = line.trim();
    if (!trimmed) {
      return fail("Empty JSON-RPC message", "empty");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      return fail(`Invalid JSON: ${truncate(trimmed)}`, "invalid_json", err);
    }

    if (!isRecord(parsed)) {
      return fail("JSON-RPC message must be an object", "unclassifiable");
    }

    if (parsed.jsonrpc !== "2.0") {
      return fail(`Invalid JSON-RPC version: ${String(parsed.jsonrpc)}`, "invalid_version");
    }

    const hasId = "id" in parsed;
    const { id, method } = parsed;

    if (typeof method === "string") {
      if (!hasId) {
        const message: JsonRpcNotification = { jsonrpc: "2.0", method };
        if ("params" in parsed) message.params = parsed.params;
        return { ok: true, kind: "notification", message };
      }
      if (isId(id)) {
        const message: JsonRpcRequest = { jsonrpc: "2.0", id, method };
        if ("params" in parsed) message.params = parsed.params;
        return { ok: true, kind: "request", message };
      }
      return fail("JSON-RPC request id must be a number or string", "unclassifiable");
    }

    if (isId(id)) {
      if ("error" in parsed) {
        const error = toErrorObject(parsed.error);
        return { ok: true, kind: "error", message: { jsonrpc: "2.0", id, error } };
      }
      if ("result" in parsed) {
        return { ok: true, kind: "response", message: { jsonrpc: "2.0", id, result: parsed.result } };
      }
    }

    return fail("Unrecognized JSON-RPC message shape", "unclassifiable");
  }

  /** Decode a line into a message. Throws JsonRpcParseError on invalid input. */
  decode(line: string): JsonRpcMessage {
    const result = this.parse(line);
    if (!result.ok) throw result.error;
    return result.message;
  }
}

function fail(
  message: string,
  reason: JsonRpcParseError["reason"],
  cause?: unknown,
): { ok: false; error: JsonRpcParseError } {
  return {
    ok: false,
    error: new JsonRpcParseError(message, reason, cause === undefined ? undefined : { cause }),
  };
}

function toErrorObject(value: unknown): JsonRpcErrorObject {
  if (!isRecord(value)) {
    return { code: JsonRpcErrorCode.INTERNAL_ERROR, message: "Unknown error" };
  }
  const error: JsonRpcErrorObject = {
    code: typeof value.code === "number" ? value.code : JsonRpcErrorCode.INTERNAL_ERROR,
    message: typeof value.message === "string" ? value.message : "Unknown error",
  };
  if ("data" in value) error.data = value.data;
  return error;
}

function truncate(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
