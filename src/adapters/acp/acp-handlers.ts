/**
 * Routes agent → client requests to the permission, file and terminal
 * handlers. Registered on AcpClient via `onRequest(handlers.handle)`.
 */

import type { Logger } from "../../interfaces/logger.js";
import type { PermissionMode } from "../../types/config.js";
import { noopLogger } from "../../utils/noop-logger.js";
import type { SpawnFn } from "./acp-client.js";
import { FileHandlers } from "./handlers/file-handlers.js";
import { PermissionPolicy, type PromptFn } from "./handlers/permission-policy.js";
import { TerminalManager } from "./handlers/terminal-manager.js";

export interface AcpHandlersOptions {
  permissionMode?: PermissionMode;
  permissionAllowlist?: string[];
  historyLimit?: number;
  onPermissionLog?: (line: string) => void;
  logger?: Logger;
  /** Overrides for interactive permission prompts. */
  isTTY?: () => boolean;
  prompt?: PromptFn;
  /** Spawn function for terminals. */
  spawnFn?: SpawnFn;
}

export const ACP_CLIENT_METHODS = [
  "session/request_permission",
  "fs/read_text_file",
  "fs/write_text_file",
  "terminal/create",
  "terminal/output",
  "terminal/wait_for_exit",
  "terminal/kill",
  "terminal/release",
] as const;

export type AcpClientMethod = (typeof ACP_CLIENT_METHODS)[number];

export class AcpHandlers {
  readonly permissions: PermissionPolicy;
  readonly files: FileHandlers;
  readonly terminals: TerminalManager;

  private readonly logger: Logger;

  constructor(options: AcpHandlersOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.permissions = new PermissionPolicy({
      mode: options.permissionMode,
      allowlist: options.permissionAllowlist,
      historyLimit: options.historyLimit,
      onPermissionLog: options.onPermissionLog,
      logger: this.logger,
      isTTY: options.isTTY,
      prompt: options.prompt,
    });
    this.files = new FileHandlers({ logger: this.logger });
    this.terminals = new TerminalManager({ spawnFn: options.spawnFn, logger: this.logger });
  }

  /**
   * Answer one agent request. Returns `undefined` for methods this client
   * does not implement so the caller can reply method-not-found.
   */
  handle = (method: string, params: unknown): unknown => {
    this.logger.debug?.("Handling agent request", { method });
    switch (method) {
      case "session/request_permission":
        return this.permissions.handleRequestPermission(params);
      case "fs/read_text_file":
        return this.files.readTextFile(params);
      case "fs/write_text_file":
        return this.files.writeTextFile(params);
      case "terminal/create":
        return this.terminals.create(params);
      case "terminal/output":
        return this.terminals.output(params);
      case "terminal/wait_for_exit":
        return this.terminals.waitForExit(params);
      case "terminal/kill":
        return this.terminals.kill(params);
      case "terminal/release":
        return this.terminals.release(params);
      default:
        return undefined;
    }
  };

  /** Kill and forget every terminal the agent left behind. */
  shutdown(): void {
    this.terminals.releaseAll();
  }
}
