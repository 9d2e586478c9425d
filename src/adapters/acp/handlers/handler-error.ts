import { isRequestHandlerError, type RequestHandlerError } from "../acp-client.js";
import { JsonRpcErrorCode } from "../json-rpc.js";

/**
 * Domain failure returned (not thrown) by a callback handler. The client
 * writes it back to the agent as a JSON-RPC error with the same code.
 */
export type HandlerError = RequestHandlerError;

export const isHandlerError: (value: unknown) => value is HandlerError = isRequestHandlerError;

export function handlerError(code: number, message: string): HandlerError {
  return { error: { code, message } };
}

export function invalidParams(message: string): HandlerError {
  return handlerError(JsonRpcErrorCode.INVALID_PARAMS, message);
}

export function missingParam(name: string): HandlerError {
  return invalidParams(`Missing required parameter: ${name}`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a required non-empty string parameter. */
export function requireString(params: Record<string, unknown>, name: string): string | HandlerError {
  const value = params[name];
  if (value === undefined || value === null || value === "") return missingParam(name);
  if (typeof value !== "string") return invalidParams(`${name} must be a string`);
  return value;
}
