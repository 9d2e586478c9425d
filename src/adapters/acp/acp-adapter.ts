/**
 * AcpAdapter: the orchestrator-facing side of the ACP subsystem.
 *
 * Owns one AcpClient (created lazily by the handshake) and the AcpSession it
 * negotiates. `execute()` frames the prompt, drives one `session/prompt` turn
 * and folds every outcome into a ToolResponse; it never rejects.
 * `killSubprocessSync()` is the path for signal handlers, which cannot wait
 * on the async `shutdown()`.
 */

import { accessSync, constants, readFileSync, statSync } from "node:fs";
import { delimiter, join, resolve } from "node:path";
import { z } from "zod";
import {
  AcpClientError,
  AcpHandshakeError,
  AcpTimeoutError,
  errorMessage,
  LoopwrightError,
} from "../../errors.js";
import type { Logger } from "../../interfaces/logger.js";
import { type AdapterConfig, type ResolvedAdapterConfig, resolveAdapterConfig } from "../../types/config.js";
import { noopLogger } from "../../utils/noop-logger.js";
import { resolvePackageVersion } from "../../utils/resolve-package-version.js";
import { AcpClient, type SpawnFn } from "./acp-client.js";
import { AcpHandlers } from "./acp-handlers.js";
import { AcpSession } from "./acp-session.js";
import type { PermissionHistoryEntry, PromptFn } from "./handlers/permission-policy.js";

export const ACP_PROTOCOL_VERSION = 1;

const CLIENT_INFO = {
  name: "loopwright",
  version: resolvePackageVersion(import.meta.url, ["../../../package.json"]),
};

/** Poll interval while waiting for a signalled agent to exit. */
const KILL_POLL_MS = 50;

export const ORCHESTRATION_CONTEXT_HEADER = "ORCHESTRATION CONTEXT:";

const ORCHESTRATION_CONTEXT = `${ORCHESTRATION_CONTEXT_HEADER}
You are running inside an automated loop that sends this task repeatedly until it is done.
- Work in small, verifiable steps and leave the workspace in a working state after each one.
- Use the file and terminal tools offered by this client instead of assuming file contents.
- When the task is complete, say so explicitly in your final message.`;

/** Uniform result handed back to the orchestration loop. */
export interface ToolResponse {
  success: boolean;
  output: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface ExecuteOptions {
  /** Overrides the configured per-request timeout for this prompt. */
  timeoutMs?: number;
}

export interface PermissionStats {
  approvedCount: number;
  deniedCount: number;
}

/** Collaborators injected around the configuration. */
export interface AcpAdapterDeps {
  logger?: Logger;
  /** Spawns the agent process. */
  spawnFn?: SpawnFn;
  /** Spawns processes for `terminal/create`. */
  terminalSpawnFn?: SpawnFn;
  onPermissionLog?: (line: string) => void;
  isTTY?: () => boolean;
  prompt?: PromptFn;
}

// ---------------------------------------------------------------------------
// Handshake and prompt replies
// ---------------------------------------------------------------------------

const initializeResultSchema = z
  .object({
    protocolVersion: z.union([z.number(), z.string()]),
    agentCapabilities: z.record(z.unknown()).optional(),
    agentInfo: z
      .object({ name: z.string().optional(), version: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const sessionNewResultSchema = z.object({ sessionId: z.string().min(1) }).passthrough();

const promptResultSchema = z.object({ stopReason: z.string().optional() }).passthrough();

export type AcpInitializeResult = z.infer<typeof initializeResultSchema>;

/** Stop reasons that mean the turn did not do the work. */
const FAILED_STOP_REASONS = new Set(["refusal", "cancelled"]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Resolve a command the way a shell would, without spawning anything. */
export function resolveExecutable(command: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (!command) return undefined;
  if (command.includes("/")) {
    const path = resolve(command);
    return isExecutableFile(path) ? path : undefined;
  }
  for (const dir of (env.PATH ?? "").split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isExecutableFile(candidate)) return candidate;
  }
  return undefined;
}

/** Prepend the fixed orchestration framing once. */
export function enhancePrompt(prompt: string): string {
  if (prompt.includes(ORCHESTRATION_CONTEXT_HEADER)) return prompt;
  return `${ORCHESTRATION_CONTEXT}\n\n${prompt}`;
}

/** Linux keeps unreaped children as zombies, which still answer signal 0. */
function isZombie(pid: number): boolean {
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, "utf-8");
    return stat.charAt(stat.lastIndexOf(")") + 2) === "Z";
  } catch {
    return false;
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  return !isZombie(pid);
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

function sleepSync(ms: number): void {
  Atomics.wait(sleepCell, 0, 0, ms);
}

function failure(error: string): ToolResponse {
  return { success: false, output: "", error };
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class AcpAdapter {
  readonly name = "acp" as const;
  readonly config: ResolvedAdapterConfig;
  /** Availability as checked at construction. */
  readonly available: boolean;

  private readonly deps: AcpAdapterDeps;
  private readonly logger: Logger;
  private readonly handlers: AcpHandlers;

  private client: AcpClient | null = null;
  private session: AcpSession | null = null;
  private initResult: AcpInitializeResult | null = null;
  private initializing: Promise<void> | null = null;
  private shutdownRequested = false;
  private signalListener: ((signal: NodeJS.Signals) => void) | null = null;

  constructor(config: AdapterConfig = {}, deps: AcpAdapterDeps = {}) {
    this.config = resolveAdapterConfig(config);
    this.deps = deps;
    this.logger = deps.logger ?? noopLogger;
    this.handlers = new AcpHandlers({
      permissionMode: this.config.permissionMode,
      permissionAllowlist: this.config.permissionAllowlist,
      historyLimit: this.config.historyLimit,
      onPermissionLog: deps.onPermissionLog,
      logger: this.logger,
      isTTY: deps.isTTY,
      prompt: deps.prompt,
      spawnFn: deps.terminalSpawnFn,
    });
    this.available = this.checkAvailability();
  }

  static fromConfig(config: AdapterConfig, deps: AcpAdapterDeps = {}): AcpAdapter {
    return new AcpAdapter(config, deps);
  }

  /** True iff the agent command resolves to an executable. Spawns nothing. */
  checkAvailability(): boolean {
    return resolveExecutable(this.config.agentCommand) !== undefined;
  }

  get sessionId(): string | undefined {
    return this.session?.sessionId;
  }

  get isInitialized(): boolean {
    return this.session !== null && this.client?.isRunning === true;
  }

  get agentInfo(): AcpInitializeResult["agentInfo"] {
    return this.initResult?.agentInfo;
  }

  /**
   * Agent pid while that process is alive. Checked against the OS, since an
   * agent can close stdout and keep running after the client has stopped.
   */
  get pid(): number | undefined {
    const pid = this.client?.pid;
    return pid !== undefined && isAlive(pid) ? pid : undefined;
  }

  toString(): string {
    return `${this.name} (available: ${this.available})`;
  }

  estimateCost(_prompt: string): number {
    return 0;
  }

  getPermissionStats(): PermissionStats {
    return {
      approvedCount: this.handlers.permissions.approvedCount,
      deniedCount: this.handlers.permissions.deniedCount,
    };
  }

  getPermissionHistory(): PermissionHistoryEntry[] {
    return this.handlers.permissions.getHistory();
  }

  // ---------------------------------------------------------------------------
  // Handshake
  // ---------------------------------------------------------------------------

  /**
   * Start the agent and negotiate a session. Idempotent; concurrent callers
   * share one handshake. Throws AcpHandshakeError and leaves nothing running
   * on any failure.
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) return;
    if (this.session) {
      this.logger.warn("ACP agent went away, starting a new session");
      await this.reset();
    }
    this.initializing ??= this.handshake().finally(() => {
      this.initializing = null;
    });
    return this.initializing;
  }

  private async handshake(): Promise<void> {
    const { agentCommand, agentArgs, cwd, env, timeoutMs, shutdownGracePeriodMs } = this.config;
    const client = new AcpClient({
      command: agentCommand,
      args: agentArgs,
      cwd,
      env,
      spawnFn: this.deps.spawnFn,
      logger: this.logger,
      shutdownGracePeriodMs,
    });
    client.onNotification(this.handleNotification);
    client.onRequest(this.handlers.handle);
    this.client = client;

    try {
      await client.start();

      const init = initializeResultSchema.safeParse(
        await client.sendRequest(
          "initialize",
          {
            protocolVersion: ACP_PROTOCOL_VERSION,
            capabilities: { fs: true, terminal: true },
            clientCapabilities: { fs: { readTextFile: true, writeTextFile: true }, terminal: true },
            clientInfo: CLIENT_INFO,
          },
          { timeoutMs },
        ),
      );
      if (!init.success) {
        throw new AcpHandshakeError("Invalid initialize response: missing protocolVersion");
      }

      const created = sessionNewResultSchema.safeParse(
        await client.sendRequest("session/new", { cwd, mcpServers: [] }, { timeoutMs }),
      );
      if (!created.success) {
        throw new AcpHandshakeError("Invalid session/new response: missing sessionId");
      }

      this.initResult = init.data;
      this.session = new AcpSession(created.data.sessionId);
      this.logger.info("ACP session established", {
        sessionId: created.data.sessionId,
        protocolVersion: init.data.protocolVersion,
        agent: init.data.agentInfo?.name ?? agentCommand,
      });
    } catch (err) {
      await client.stop();
      this.client = null;
      if (err instanceof AcpHandshakeError) throw err;
      if (err instanceof AcpTimeoutError) {
        throw new AcpHandshakeError("Initialization timed out", { cause: err });
      }
      throw new AcpHandshakeError(`ACP handshake failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private handleNotification = (method: string, params: unknown): void => {
    if (method !== "session/update") {
      this.logger.debug?.("Ignoring ACP notification", { method });
      return;
    }
    if (!this.session?.processUpdate(params)) {
      this.logger.debug?.("Dropped session/update", { sessionId: this.session?.sessionId });
    }
  };

  // ---------------------------------------------------------------------------
  // Execute
  // ---------------------------------------------------------------------------

  /** Run one prompt turn. Never rejects. */
  async execute(prompt: string, options: ExecuteOptions = {}): Promise<ToolResponse> {
    if (!this.available) {
      return failure(`ACP adapter not available: ${this.config.agentCommand} not found`);
    }
    if (this.shutdownRequested) {
      return failure("ACP adapter is shutting down");
    }

    try {
      await this.initialize();
      return await this.runPrompt(enhancePrompt(prompt), options.timeoutMs ?? this.config.timeoutMs);
    } catch (err) {
      this.logger.error("ACP execute failed", { error: err });
      return failure(err instanceof LoopwrightError ? `ACP error: ${err.message}` : errorMessage(err));
    }
  }

  private async runPrompt(text: string, timeoutMs: number): Promise<ToolResponse> {
    const { client, session } = this;
    if (!client || !session) throw new AcpClientError("ACP session is not initialized");

    session.beginTurn();
    let reply: unknown;
    try {
      reply = await client.sendRequest(
        "session/prompt",
        { sessionId: session.sessionId, prompt: [{ type: "text", text }] },
        { timeoutMs },
      );
    } catch (err) {
      if (err instanceof AcpTimeoutError) return this.cancelTimedOutTurn(client, session, timeoutMs);
      // The agent is gone; the next execute starts over
      if (err instanceof AcpClientError) await this.reset();
      throw err;
    }

    const parsed = promptResultSchema.safeParse(reply);
    const stopReason = parsed.success ? parsed.data.stopReason : undefined;
    session.endTurn(stopReason);

    const metadata = this.turnMetadata(session);
    if (stopReason !== undefined && FAILED_STOP_REASONS.has(stopReason)) {
      return { success: false, output: session.output, error: `Agent stopped: ${stopReason}`, metadata };
    }
    return { success: true, output: session.output, metadata };
  }

  private async cancelTimedOutTurn(
    client: AcpClient,
    session: AcpSession,
    timeoutMs: number,
  ): Promise<ToolResponse> {
    this.logger.warn("ACP prompt timed out, cancelling turn", { sessionId: session.sessionId, timeoutMs });
    try {
      await client.sendNotification("session/cancel", { sessionId: session.sessionId });
    } catch (err) {
      this.logger.warn("Failed to send session/cancel", { error: errorMessage(err) });
    }
    return {
      success: false,
      output: session.output,
      error: `ACP prompt timed out after ${timeoutMs}ms`,
      metadata: this.turnMetadata(session),
    };
  }

  private turnMetadata(session: AcpSession): Record<string, unknown> {
    return {
      tool: this.name,
      agent: this.config.agentCommand,
      sessionId: session.sessionId,
      stopReason: session.stopReason,
      toolCalls: session.toolCalls,
      thoughts: session.thoughts,
      plan: session.plan,
    };
  }

  // ---------------------------------------------------------------------------
  // Teardown
  // ---------------------------------------------------------------------------

  /** Stop the agent and forget the session so the next call re-handshakes. */
  private async reset(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.session = null;
    this.initResult = null;
    await client?.stop();
  }

  /** Stop the agent, release terminals and remove signal listeners. Idempotent. */
  async shutdown(): Promise<void> {
    this.restoreSignalHandlers();
    this.handlers.shutdown();
    await this.initializing?.catch(() => undefined);
    await this.reset();
  }

  /**
   * Synchronous kill for signal handlers: SIGTERM the stored pid, poll for
   * exit up to `killGracePeriodMs`, then SIGKILL. Never throws.
   */
  killSubprocessSync(): void {
    const pid = this.pid;
    if (pid === undefined) return;
    try {
      process.kill(pid, "SIGTERM");
      const deadline = Date.now() + this.config.killGracePeriodMs;
      while (Date.now() < deadline) {
        if (!isAlive(pid)) return;
        sleepSync(KILL_POLL_MS);
      }
      if (isAlive(pid)) process.kill(pid, "SIGKILL");
    } catch (err) {
      this.logger.debug?.("Synchronous agent kill failed", { pid, error: errorMessage(err) });
    }
  }

  /**
   * Kill the agent on SIGINT/SIGTERM. When no other listener handles the
   * signal, the default disposition is restored and the signal re-raised so
   * the process still exits.
   */
  registerSignalHandlers(): void {
    if (this.signalListener) return;
    const listener = (signal: NodeJS.Signals) => {
      this.shutdownRequested = true;
      this.logger.warn("Received signal, killing ACP agent", { signal });
      this.killSubprocessSync();
      this.handlers.shutdown();
      if (process.listenerCount(signal) === 1) {
        this.restoreSignalHandlers();
        process.kill(process.pid, signal);
      }
    };
    this.signalListener = listener;
    process.on("SIGINT", listener);
    process.on("SIGTERM", listener);
  }

  restoreSignalHandlers(): void {
    const listener = this.signalListener;
    if (!listener) return;
    this.signalListener = null;
    process.off("SIGINT", listener);
    process.off("SIGTERM", listener);
  }

  get isShutdownRequested(): boolean {
    return this.shutdownRequested;
  }
}
