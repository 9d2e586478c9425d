/**
 * AcpClient: owns one ACP agent subprocess.
 *
 * One reader drains the subprocess's stdout and dispatches every decoded line:
 * responses settle the matching pending call, notifications fan out to the
 * registered handlers, and agent-initiated requests are answered by the first
 * request handler that produces a result. All writes to stdin go through one
 * promise chain so concurrent senders never interleave partial lines.
 *
 * Lifecycle: not_started → running → stopped. `stop()` is idempotent.
 */

import { type ChildProcess, type SpawnOptions, spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { AcpClientError, AcpRequestError, AcpTimeoutError, errorMessage } from "../../errors.js";
import type { Logger } from "../../interfaces/logger.js";
import { NDJSONLineBuffer } from "../../utils/ndjson.js";
import { noopLogger } from "../../utils/noop-logger.js";
import { RingBuffer } from "../../utils/ring-buffer.js";
import {
  type ClassifiedMessage,
  type JsonRpcErrorObject,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  JsonRpcCodec,
  JsonRpcErrorCode,
} from "./json-rpc.js";

/** Spawn function signature matching child_process.spawn. */
export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export type ClientState = "not_started" | "running" | "stopped";

export type NotificationHandler = (method: string, params: unknown) => void | Promise<void>;

/**
 * Answers an agent-initiated request. Return `undefined` to pass the request
 * to the next handler, a `{ error }` shape to reply with a JSON-RPC error, or
 * any other value to reply with it as the result.
 */
export type RequestHandler = (method: string, params: unknown) => unknown;

/** Error shape a request handler returns instead of throwing. */
export interface RequestHandlerError {
  error: JsonRpcErrorObject;
}

export interface AcpClientOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  spawnFn?: SpawnFn;
  logger?: Logger;
  /** How long `stop()` waits after SIGTERM before sending SIGKILL (default: 5000). */
  shutdownGracePeriodMs?: number;
}

export interface SendRequestOptions {
  /** Reject with AcpTimeoutError and forget the call if no reply arrives in time. */
  timeoutMs?: number;
}

interface PendingCall {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
}

const DEFAULT_SHUTDOWN_GRACE_MS = 5000;
/** Upper bound on waiting for exit after SIGKILL. */
const FORCE_KILL_WAIT_MS = 1000;
const STDERR_TAIL_LINES = 50;

export function isRequestHandlerError(value: unknown): value is RequestHandlerError {
  if (typeof value !== "object" || value === null || !("error" in value)) return false;
  const error: unknown = value.error;
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "number" &&
    "message" in error &&
    typeof error.message === "string"
  );
}

export class AcpClient {
  readonly command: string;
  readonly args: readonly string[];

  private readonly cwd: string | undefined;
  private readonly env: Record<string, string> | undefined;
  private readonly spawnFn: SpawnFn;
  private readonly logger: Logger;
  private readonly shutdownGracePeriodMs: number;
  private readonly codec = new JsonRpcCodec();

  private child: ChildProcess | null = null;
  private childPid: number | undefined;
  private _state: ClientState = "not_started";
  private readonly pending = new Map<JsonRpcId, PendingCall>();
  private readonly notificationHandlers: NotificationHandler[] = [];
  private readonly requestHandlers: RequestHandler[] = [];
  private readonly stdoutBuffer = new NDJSONLineBuffer();
  private readonly stderrBuffer = new NDJSONLineBuffer();
  private readonly stderrLines = new RingBuffer<string>(STDERR_TAIL_LINES);
  private writeChain: Promise<void> = Promise.resolve();
  private detachWorker: (() => void) | null = null;
  private workerExited = false;
  private stopping: Promise<void> | null = null;

  constructor(options: AcpClientOptions) {
    this.command = options.command;
    this.args = [...(options.args ?? [])];
    this.cwd = options.cwd;
    this.env = options.env;
    this.spawnFn = options.spawnFn ?? spawn;
    this.logger = options.logger ?? noopLogger;
    this.shutdownGracePeriodMs = options.shutdownGracePeriodMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  }

  get state(): ClientState {
    return this._state;
  }

  get isRunning(): boolean {
    return this._state === "running";
  }

  /** OS process id of the agent, kept after exit for the synchronous kill path. */
  get pid(): number | undefined {
    return this.childPid;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Most recent stderr lines from the agent, oldest first. */
  stderrTail(): string[] {
    return this.stderrLines.toArray();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    if (this._state !== "not_started") {
      throw new AcpClientError(`Cannot start ACP client in state "${this._state}"`);
    }

    let child: ChildProcess;
    try {
      child = this.spawnFn(this.command, [...this.args], {
        stdio: ["pipe", "pipe", "pipe"],
        cwd: this.cwd,
        env: this.env ? { ...process.env, ...this.env } : undefined,
      });
    } catch (err) {
      this._state = "stopped";
      throw new AcpClientError(`Failed to spawn ACP agent "${this.command}": ${errorMessage(err)}`, {
        cause: err,
      });
    }

    // Spawn failures (ENOENT) surface asynchronously as "error"; keep them from
    // becoming uncaught exceptions until the worker's own listener is attached.
    const earlyErrorListener = (err: Error) => {
      this.logger.debug?.("ACP agent spawn error", { command: this.command, error: err });
    };
    child.on("error", earlyErrorListener);

    if (typeof child.pid !== "number" || !child.stdout || !child.stdin) {
      this._state = "stopped";
      throw new AcpClientError(`Failed to spawn ACP agent "${this.command}"`);
    }

    this.child = child;
    this.childPid = child.pid;
    this._state = "running";
    this.attachWorker(child, child.stdout);
    child.off("error", earlyErrorListener);

    this.logger.info("ACP agent started", {
      command: this.command,
      args: this.args,
      pid: child.pid,
    });
  }

  /**
   * Stop the client: detach the reader, SIGTERM the agent, SIGKILL it if it
   * has not exited within the grace period, then fail every pending call.
   * Every wait is bounded. Repeated calls share the first call's promise.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const child = this.child;
    this._state = "stopped";
    this.detachWorker?.();
    this.detachWorker = null;

    if (child) {
      await terminateChild(child, this.shutdownGracePeriodMs, this.logger);
      this.logger.info("ACP agent stopped", { pid: this.childPid });
    }

    this.failPending(new AcpClientError("ACP client stopped"));
  }

  // ---------------------------------------------------------------------------
  // Handlers
  // ---------------------------------------------------------------------------

  onNotification(handler: NotificationHandler): void {
    this.notificationHandlers.push(handler);
  }

  onRequest(handler: RequestHandler): void {
    this.requestHandlers.push(handler);
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  /**
   * Send a request and return a promise for its result. The promise settles
   * exactly once: with the agent's result, with an AcpRequestError for an
   * error reply, or with an AcpClientError when the write fails or the
   * subprocess goes away.
   */
  sendRequest(method: string, params?: unknown, options: SendRequestOptions = {}): Promise<unknown> {
    if (this._state !== "running") {
      return Promise.reject(new AcpClientError(`ACP client is not running (${method})`));
    }

    const { id, line } = this.codec.createRequest(method, params);
    const result = new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
    });

    this.write(line).catch((err: unknown) => {
      this.settle(id, (call) =>
        call.reject(
          new AcpClientError(`Failed to send ${method}: ${errorMessage(err)}`, { cause: err }),
        ),
      );
    });

    const { timeoutMs } = options;
    if (timeoutMs === undefined || timeoutMs <= 0) return result;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new AcpTimeoutError(`ACP request "${method}" timed out after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
    });

    return Promise.race([result, timeout]).finally(() => {
      clearTimeout(timer);
    });
  }

  /** Fire-and-forget notification. Resolves once the line is written. */
  async sendNotification(method: string, params?: unknown): Promise<void> {
    if (this._state !== "running") {
      throw new AcpClientError(`ACP client is not running (${method})`);
    }
    await this.write(this.codec.encode(this.codec.createNotification(method, params)));
  }

  private write(line: string): Promise<void> {
    const next = this.writeChain.then(() => this.writeLine(line));
    // A failed write rejects its own caller; the chain continues for the rest.
    this.writeChain = next.catch((err: unknown) => {
      this.logger.debug?.("ACP write failed", { error: errorMessage(err) });
    });
    return next;
  }

  private writeLine(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const stdin = this.child?.stdin;
      if (!stdin || stdin.destroyed || !stdin.writable) {
        reject(new AcpClientError("ACP subprocess stdin is not writable"));
        return;
      }
      stdin.write(line, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // ---------------------------------------------------------------------------
  // Reader worker
  // ---------------------------------------------------------------------------

  private attachWorker(child: ChildProcess, stdout: Readable): void {
    const onData = (chunk: Buffer | string) => {
      for (const line of this.stdoutBuffer.feed(chunk)) {
        this.handleLine(line);
      }
    };
    const onStderr = (chunk: Buffer | string) => {
      for (const line of this.stderrBuffer.feed(chunk)) {
        this.stderrLines.push(line);
        this.logger.debug?.("ACP agent stderr", { line });
      }
    };
    const onStdoutClosed = () => this.onWorkerExit("stdout closed");
    const onChildClose = (code: number | null, signal: NodeJS.Signals | null) =>
      this.onWorkerExit(`exited with ${signal ? `signal ${signal}` : `code ${String(code)}`}`);
    const onChildError = (err: Error) => {
      this.logger.error("ACP agent process error", { command: this.command, error: err });
      this.onWorkerExit(err.message);
    };
    const onStdinError = (err: Error) => {
      this.logger.warn("ACP agent stdin error", { error: err });
    };

    stdout.on("data", onData);
    stdout.on("end", onStdoutClosed);
    stdout.on("close", onStdoutClosed);
    child.stderr?.on("data", onStderr);
    child.stdin?.on("error", onStdinError);
    child.on("close", onChildClose);
    child.on("error", onChildError);

    this.detachWorker = () => {
      stdout.off("data", onData);
      stdout.off("end", onStdoutClosed);
      stdout.off("close", onStdoutClosed);
      child.stderr?.off("data", onStderr);
      child.off("close", onChildClose);
      // Keep swallowing late process/stdin errors after detaching.
      child.off("error", onChildError);
      child.on("error", (err: Error) => {
        this.logger.debug?.("ACP agent error after detach", { error: err });
      });
    };
  }

  private onWorkerExit(reason: string): void {
    if (this.workerExited) return;
    this.workerExited = true;

    const tail = this.stdoutBuffer.flush();
    if (tail) this.handleLine(tail);

    this.detachWorker?.();
    this.detachWorker = null;
    if (this._state === "running") this._state = "stopped";

    if (this.pending.size > 0 || !this.stopping) {
      this.logger.warn("ACP agent reader exited", { reason, pending: this.pending.size });
    }
    this.failPending(new AcpClientError(`ACP subprocess terminated: ${reason}`));
  }

  private handleLine(line: string): void {
    const parsed = this.codec.parse(line);
    if (!parsed.ok) {
      this.logger.warn("Skipping malformed ACP line", {
        reason: parsed.error.reason,
        error: parsed.error.message,
      });
      return;
    }
    this.route(parsed);
  }

  private route(msg: ClassifiedMessage): void {
    switch (msg.kind) {
      case "response":
        this.settle(msg.message.id, (call) => call.resolve(msg.message.result));
        return;
      case "error": {
        const { code, message, data } = msg.message.error;
        this.settle(msg.message.id, (call) =>
          call.reject(new AcpRequestError(`${call.method} failed: ${message}`, code, data)),
        );
        return;
      }
      case "notification":
        this.dispatchNotification(msg.message.method, msg.message.params);
        return;
      case "request":
        void this.dispatchRequest(msg.message);
        return;
    }
  }

  /** Pop and settle one pending call. Unknown ids (late or duplicate replies) are dropped. */
  private settle(id: JsonRpcId, action: (call: PendingCall) => void): void {
    const call = this.pending.get(id);
    if (!call) {
      this.logger.debug?.("Dropping ACP reply with no pending call", { id });
      return;
    }
    this.pending.delete(id);
    action(call);
  }

  private failPending(error: Error): void {
    const calls = [...this.pending.values()];
    this.pending.clear();
    for (const call of calls) {
      call.reject(error);
    }
  }

  private dispatchNotification(method: string, params: unknown): void {
    for (const handler of this.notificationHandlers) {
      try {
        const maybePromise = handler(method, params);
        if (maybePromise instanceof Promise) {
          maybePromise.catch((err: unknown) => {
            this.logger.error("ACP notification handler failed", { method, error: errorMessage(err) });
          });
        }
      } catch (err) {
        this.logger.error("ACP notification handler failed", { method, error: errorMessage(err) });
      }
    }
  }

  private async dispatchRequest(request: JsonRpcRequest): Promise<void> {
    const { id, method, params } = request;
    let reply: JsonRpcResponse;

    try {
      const result = await this.runRequestHandlers(method, params);
      if (result === undefined) {
        reply = this.codec.createErrorResponse(
          id,
          JsonRpcErrorCode.METHOD_NOT_FOUND,
          `Method not found: ${method}`,
        );
      } else if (isRequestHandlerError(result)) {
        reply = this.codec.createErrorResponse(
          id,
          result.error.code,
          result.error.message,
          result.error.data,
        );
      } else {
        reply = this.codec.createResponse(id, result);
      }
    } catch (err) {
      this.logger.error("ACP request handler failed", { method, error: errorMessage(err) });
      reply = this.codec.createErrorResponse(id, JsonRpcErrorCode.INTERNAL_ERROR, errorMessage(err));
    }

    if (this._state !== "running") return;
    try {
      await this.write(this.codec.encode(reply));
    } catch (err) {
      this.logger.warn("Failed to answer ACP request", { method, id, error: errorMessage(err) });
    }
  }

  private async runRequestHandlers(method: string, params: unknown): Promise<unknown> {
    for (const handler of this.requestHandlers) {
      const result = await handler(method, params);
      if (result !== undefined) return result;
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Process termination
// ---------------------------------------------------------------------------

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function safeKill(child: ChildProcess, signal: NodeJS.Signals): void {
  try {
    child.kill(signal);
  } catch {
    // Process may already be dead
  }
}

function waitForExit(child: ChildProcess, ms: number): Promise<boolean> {
  if (hasExited(child)) return Promise.resolve(true);
  return new Promise<boolean>((resolve) => {
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.off("exit", onExit);
      resolve(false);
    }, ms);
    child.once("exit", onExit);
  });
}

/** SIGTERM, wait up to `graceMs`, then SIGKILL and wait a bounded moment more. */
export async function terminateChild(
  child: ChildProcess,
  graceMs: number,
  logger: Logger = noopLogger,
): Promise<void> {
  if (hasExited(child)) return;

  const exited = waitForExit(child, graceMs);
  safeKill(child, "SIGTERM");
  if (await exited) return;

  logger.warn("ACP agent ignored SIGTERM, force-killing", { pid: child.pid, graceMs });
  const killed = waitForExit(child, FORCE_KILL_WAIT_MS);
  safeKill(child, "SIGKILL");
  await killed;
}
