export type {
  AcpAdapterDeps,
  AcpInitializeResult,
  ExecuteOptions,
  PermissionStats,
  ToolResponse,
} from "./acp-adapter.js";
export { ACP_PROTOCOL_VERSION, AcpAdapter, enhancePrompt, resolveExecutable } from "./acp-adapter.js";
export type {
  AcpClientOptions,
  ClientState,
  NotificationHandler,
  RequestHandler,
  RequestHandlerError,
  SendRequestOptions,
  SpawnFn,
} from "./acp-client.js";
export { AcpClient, isRequestHandlerError } from "./acp-client.js";
export type { AcpClientMethod, AcpHandlersOptions } from "./acp-handlers.js";
export { ACP_CLIENT_METHODS, AcpHandlers } from "./acp-handlers.js";
export type { AcpPlanEntry, AcpSessionSnapshot, AcpToolCall } from "./acp-session.js";
export { AcpSession } from "./acp-session.js";
export { FileHandlers } from "./handlers/file-handlers.js";
export type { HandlerError } from "./handlers/handler-error.js";
export { isHandlerError } from "./handlers/handler-error.js";
export type {
  PermissionDecision,
  PermissionHistoryEntry,
  PermissionOption,
  PermissionOutcome,
  PermissionPolicyOptions,
  PermissionRequest,
  PromptFn,
} from "./handlers/permission-policy.js";
export { matchesPattern, PermissionPolicy } from "./handlers/permission-policy.js";
export { TerminalManager } from "./handlers/terminal-manager.js";
export { JsonRpcCodec, JsonRpcErrorCode } from "./json-rpc.js";
