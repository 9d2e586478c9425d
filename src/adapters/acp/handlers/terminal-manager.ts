/**
 * TerminalManager: agent-spawned processes for the `terminal/*` methods.
 *
 * Each terminal is one child process with stdout and stderr captured into a
 * single buffer. Terminals live in a table keyed by generated ids until the
 * agent releases them; every operation looks its entry up once, so a release
 * racing another call never leaves a half-removed terminal behind.
 */

import { type ChildProcess, spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import { stat } from "node:fs/promises";
import { StringDecoder } from "node:string_decoder";
import { errorMessage } from "../../../errors.js";
import type { Logger } from "../../../interfaces/logger.js";
import { noopLogger } from "../../../utils/noop-logger.js";
import type { SpawnFn } from "../acp-client.js";
import { JsonRpcErrorCode } from "../json-rpc.js";
import {
  type HandlerError,
  handlerError,
  invalidParams,
  isHandlerError,
  isRecord,
  missingParam,
  requireString,
} from "./handler-error.js";

export interface TerminalExitStatus {
  exitCode: number | null;
  signal: string | null;
}

export interface TerminalOutputResult {
  output: string;
  truncated: boolean;
  done: boolean;
  exitStatus?: TerminalExitStatus;
}

export interface TerminalManagerOptions {
  spawnFn?: SpawnFn;
  logger?: Logger;
}

interface Terminal {
  id: string;
  command: string[];
  child: ChildProcess;
  output: string;
  truncated: boolean;
  outputByteLimit: number | undefined;
  exitStatus: TerminalExitStatus | undefined;
  exited: Promise<TerminalExitStatus>;
}

/** How long output may trail the process exit before the terminal counts as done. */
const OUTPUT_DRAIN_MS = 100;

interface CreateRequest {
  command: string[];
  cwd: string | undefined;
  env: Record<string, string>;
  outputByteLimit: number | undefined;
}

// ---------------------------------------------------------------------------
// Param parsing
// ---------------------------------------------------------------------------

function parseCommand(params: Record<string, unknown>): string[] | HandlerError {
  const { command, args } = params;
  if (command === undefined || command === null) return missingParam("command");

  // ACP shape: command is the program, args the rest
  if (typeof command === "string" && Array.isArray(args)) {
    if (!args.every((a): a is string => typeof a === "string")) {
      return invalidParams("args must be a list of strings");
    }
    return command === "" ? invalidParams("command list cannot be empty") : [command, ...args];
  }

  if (!Array.isArray(command)) return invalidParams("command must be a list");
  if (command.length === 0) return invalidParams("command list cannot be empty");
  if (!command.every((c): c is string => typeof c === "string")) {
    return invalidParams("command must be a list of strings");
  }
  return command;
}

/** Accepts ACP's `[{ name, value }]` list or a plain object. */
function parseEnv(value: unknown): Record<string, string> | HandlerError {
  if (value === undefined || value === null) return {};
  if (Array.isArray(value)) {
    const env: Record<string, string> = {};
    for (const entry of value) {
      if (!isRecord(entry) || typeof entry.name !== "string" || typeof entry.value !== "string") {
        return invalidParams("env entries must be { name, value } strings");
      }
      env[entry.name] = entry.value;
    }
    return env;
  }
  if (isRecord(value)) {
    const env: Record<string, string> = {};
    for (const [name, v] of Object.entries(value)) {
      if (typeof v !== "string") return invalidParams(`env.${name} must be a string`);
      env[name] = v;
    }
    return env;
  }
  return invalidParams("env must be a list or an object");
}

function parseCreate(params: unknown): CreateRequest | HandlerError {
  if (!isRecord(params)) return missingParam("command");

  const command = parseCommand(params);
  if (isHandlerError(command)) return command;

  const cwd = params.cwd;
  if (cwd !== undefined && cwd !== null && typeof cwd !== "string") {
    return invalidParams("cwd must be a string");
  }

  const env = parseEnv(params.env);
  if (isHandlerError(env)) return env;

  const limit = params.outputByteLimit;
  if (limit !== undefined && limit !== null) {
    if (typeof limit !== "number" || !Number.isInteger(limit) || limit < 0) {
      return invalidParams("outputByteLimit must be a non-negative integer");
    }
  }

  return {
    command,
    cwd: typeof cwd === "string" && cwd !== "" ? cwd : undefined,
    env,
    outputByteLimit: typeof limit === "number" ? limit : undefined,
  };
}

/** Keep the last `limit` bytes, starting on a character boundary. */
function truncateFront(text: string, limit: number): string {
  const bytes = Buffer.from(text, "utf-8");
  if (bytes.length <= limit) return text;
  let start = bytes.length - limit;
  // Skip UTF-8 continuation bytes
  while (start < bytes.length && ((bytes[start] ?? 0) & 0xc0) === 0x80) start++;
  return bytes.subarray(start).toString("utf-8");
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class TerminalManager {
  private readonly terminals = new Map<string, Terminal>();
  private readonly spawnFn: SpawnFn;
  private readonly logger: Logger;

  constructor(options: TerminalManagerOptions = {}) {
    this.spawnFn = options.spawnFn ?? spawn;
    this.logger = options.logger ?? noopLogger;
  }

  get size(): number {
    return this.terminals.size;
  }

  /** `terminal/create` → `{ terminalId }` */
  async create(params: unknown): Promise<{ terminalId: string } | HandlerError> {
    const request = parseCreate(params);
    if ("error" in request) return request;
    const { command, cwd, env, outputByteLimit } = request;

    if (cwd !== undefined) {
      const dir = await stat(cwd).catch(() => undefined);
      if (!dir?.isDirectory()) {
        return handlerError(JsonRpcErrorCode.INVALID_PARAMS, `cwd is not a directory: ${cwd}`);
      }
    }

    const [program, ...args] = command;
    if (program === undefined) return invalidParams("command list cannot be empty");

    let child: ChildProcess;
    try {
      child = this.spawnFn(program, args, {
        cwd,
        env: { ...process.env, ...env },
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (err) {
      return spawnFailure(program, err);
    }

    // ENOENT and friends arrive as an "error" event instead of "spawn".
    const started = await new Promise<Error | null>((resolve) => {
      child.once("spawn", () => resolve(null));
      child.once("error", (err: Error) => resolve(err));
    });
    if (started) return spawnFailure(program, started);

    const terminal = this.track(command, child, outputByteLimit);
    this.logger.info("Terminal created", { terminalId: terminal.id, command, pid: child.pid });
    return { terminalId: terminal.id };
  }

  private track(command: string[], child: ChildProcess, outputByteLimit: number | undefined): Terminal {
    const id = `term-${randomUUID()}`;
    let resolveExit: (status: TerminalExitStatus) => void = () => undefined;
    const exited = new Promise<TerminalExitStatus>((resolve) => {
      resolveExit = resolve;
    });

    const terminal: Terminal = {
      id,
      command,
      child,
      output: "",
      truncated: false,
      outputByteLimit,
      exitStatus: undefined,
      exited,
    };

    const append = (text: string) => {
      if (!text) return;
      terminal.output += text;
      if (terminal.outputByteLimit !== undefined) {
        const kept = truncateFront(terminal.output, terminal.outputByteLimit);
        if (kept !== terminal.output) {
          terminal.output = kept;
          terminal.truncated = true;
        }
      }
    };
    const stdoutDecoder = new StringDecoder("utf-8");
    const stderrDecoder = new StringDecoder("utf-8");
    child.stdout?.on("data", (chunk: Buffer) => append(stdoutDecoder.write(chunk)));
    child.stderr?.on("data", (chunk: Buffer) => append(stderrDecoder.write(chunk)));

    // Settles on "close" once both pipes drain, or shortly after "exit" when a
    // background process the command left behind still holds them open.
    let status: TerminalExitStatus | undefined;
    let drainTimer: ReturnType<typeof setTimeout> | undefined;
    const settle = () => {
      if (status === undefined || terminal.exitStatus !== undefined) return;
      clearTimeout(drainTimer);
      append(stdoutDecoder.end());
      append(stderrDecoder.end());
      terminal.exitStatus = status;
      this.logger.debug?.("Terminal exited", { terminalId: id, ...status });
      resolveExit(status);
    };
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      status = { exitCode: code, signal };
      drainTimer = setTimeout(settle, OUTPUT_DRAIN_MS);
      drainTimer.unref();
    });
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (status === undefined) status = { exitCode: code, signal };
      settle();
    });
    child.on("error", (err: Error) => {
      this.logger.warn("Terminal process error", { terminalId: id, error: err });
    });

    this.terminals.set(id, terminal);
    return terminal;
  }

  private lookup(params: unknown): Terminal | HandlerError {
    if (!isRecord(params)) return missingParam("terminalId");
    const id = requireString(params, "terminalId");
    if (typeof id !== "string") return id;
    const terminal = this.terminals.get(id);
    if (!terminal) return handlerError(JsonRpcErrorCode.RESOURCE_NOT_FOUND, `Terminal not found: ${id}`);
    return terminal;
  }

  /** `terminal/output` → captured output so far */
  output(params: unknown): TerminalOutputResult | HandlerError {
    const terminal = this.lookup(params);
    if ("error" in terminal) return terminal;
    return {
      output: terminal.output,
      truncated: terminal.truncated,
      done: terminal.exitStatus !== undefined,
      ...(terminal.exitStatus && { exitStatus: { ...terminal.exitStatus } }),
    };
  }

  /**
   * `terminal/wait_for_exit` → `{ exitCode, signal }`. `timeout` is in
   * seconds; exceeding it leaves the process running.
   */
  async waitForExit(params: unknown): Promise<TerminalExitStatus | HandlerError> {
    const terminal = this.lookup(params);
    if ("error" in terminal) return terminal;

    const timeout = isRecord(params) ? params.timeout : undefined;
    if (timeout === undefined || timeout === null) return { ...(await terminal.exited) };
    if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout < 0) {
      return invalidParams("timeout must be a non-negative number of seconds");
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeout * 1000);
    });
    try {
      const status = await Promise.race([terminal.exited, timedOut]);
      if (status) return { ...status };
      return handlerError(
        JsonRpcErrorCode.OPERATION_TIMEOUT,
        `Terminal wait timed out after ${timeout}s`,
      );
    } finally {
      clearTimeout(timer);
    }
  }

  /** `terminal/kill`: SIGTERM; a terminal that already exited is left alone. */
  kill(params: unknown): { success: true } | HandlerError {
    const terminal = this.lookup(params);
    if ("error" in terminal) return terminal;
    this.signal(terminal, "SIGTERM");
    return { success: true };
  }

  /** `terminal/release`: kill if still running and forget the terminal. */
  release(params: unknown): { success: true } | HandlerError {
    const terminal = this.lookup(params);
    if ("error" in terminal) return terminal;
    this.terminals.delete(terminal.id);
    this.signal(terminal, "SIGKILL");
    this.logger.debug?.("Terminal released", { terminalId: terminal.id });
    return { success: true };
  }

  /** Release every terminal; returns how many there were. */
  releaseAll(): number {
    const all = [...this.terminals.values()];
    this.terminals.clear();
    for (const terminal of all) {
      this.signal(terminal, "SIGKILL");
    }
    if (all.length > 0) this.logger.info("Released all terminals", { count: all.length });
    return all.length;
  }

  private signal(terminal: Terminal, signal: NodeJS.Signals): void {
    if (terminal.exitStatus !== undefined) return;
    try {
      terminal.child.kill(signal);
    } catch (err) {
      this.logger.warn("Failed to signal terminal", { terminalId: terminal.id, signal, error: errorMessage(err) });
    }
  }
}

function spawnFailure(program: string, err: unknown): HandlerError {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    return handlerError(JsonRpcErrorCode.RESOURCE_NOT_FOUND, `Command not found: ${program}`);
  }
  return handlerError(JsonRpcErrorCode.INTERNAL_ERROR, `Failed to start ${program}: ${errorMessage(err)}`);
}
