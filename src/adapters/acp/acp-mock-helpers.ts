/**
 * In-process stand-in for an ACP agent subprocess.
 *
 * Used by acp-client.test.ts and acp-adapter.test.ts. The child is an
 * EventEmitter with stream-like stdin/stdout/stderr; tests push agent output
 * through `stdout` and inspect what the client wrote to `stdin`.
 */

import type { ChildProcess } from "node:child_process";
import { EventEmitter } from "node:events";
import { vi } from "vitest";
import type { SpawnFn } from "./acp-client.js";

export class MockStream extends EventEmitter {
  readonly chunks: string[] = [];
  writable = true;
  destroyed = false;
  /** When set, the next write fails with this error. */
  failNextWrite: Error | null = null;

  write(data: string, cb?: (err?: Error | null) => void): boolean {
    const failure = this.failNextWrite;
    this.failNextWrite = null;
    if (failure) {
      queueMicrotask(() => cb?.(failure));
      return false;
    }
    this.chunks.push(data);
    queueMicrotask(() => cb?.(null));
    return true;
  }

  /** Parsed JSON objects written so far. */
  messages(): Array<Record<string, unknown>> {
    return this.chunks.map((c) => JSON.parse(c.trim()) as Record<string, unknown>);
  }
}

export interface MockChild {
  child: ChildProcess;
  stdin: MockStream;
  stdout: MockStream;
  stderr: MockStream;
  /** Simulate the agent exiting on its own. */
  exit(code?: number | null, signal?: NodeJS.Signals | null): void;
}

export interface MockChildOptions {
  /** Ignore SIGTERM so stop() must escalate to SIGKILL. */
  ignoreSigterm?: boolean;
  pid?: number;
}

export function createMockChild(options: MockChildOptions = {}): MockChild {
  const stdin = new MockStream();
  const stdout = new MockStream();
  const stderr = new MockStream();
  const child = new EventEmitter() as ChildProcess;

  const exit = (code: number | null = 0, signal: NodeJS.Signals | null = null) => {
    if (child.exitCode !== null || child.signalCode !== null) return;
    Object.assign(child, { exitCode: code, signalCode: signal });
    stdin.writable = false;
    child.emit("exit", code, signal);
    stdout.emit("end");
    child.emit("close", code, signal);
  };

  Object.assign(child, {
    stdin,
    stdout,
    stderr,
    pid: options.pid ?? 12345,
    exitCode: null,
    signalCode: null,
    killed: false,
    kill: vi.fn((signal: NodeJS.Signals = "SIGTERM") => {
      if (signal === "SIGTERM" && options.ignoreSigterm) return true;
      Object.assign(child, { killed: true });
      queueMicrotask(() => exit(null, signal));
      return true;
    }),
  });

  return { child, stdin, stdout, stderr, exit };
}

/** SpawnFn that hands out the given mock and records each call. */
export function mockSpawnFn(mock: MockChild): SpawnFn & { calls: Array<{ command: string; args: string[] }> } {
  const calls: Array<{ command: string; args: string[] }> = [];
  const fn = (command: string, args: string[]) => {
    calls.push({ command, args });
    return mock.child;
  };
  return Object.assign(fn, { calls });
}

export function respondToRequest(stdout: MockStream, id: number, result: unknown): void {
  const response = `${JSON.stringify({ jsonrpc: "2.0", id, result })}\n`;
  stdout.emit("data", Buffer.from(response));
}

export function respondWithError(
  stdout: MockStream,
  id: number,
  code: number,
  message: string,
): void {
  const response = `${JSON.stringify({ jsonrpc: "2.0", id, error: { code, message } })}\n`;
  stdout.emit("data", Buffer.from(response));
}

export function sendNotification(stdout: MockStream, method: string, params: unknown): void {
  const notification = `${JSON.stringify({ jsonrpc: "2.0", method, params })}\n`;
  stdout.emit("data", Buffer.from(notification));
}

export function sendRequest(
  stdout: MockStream,
  id: number | string,
  method: string,
  params: unknown,
): void {
  const request = `${JSON.stringify({ jsonrpc: "2.0", id, method, params })}\n`;
  stdout.emit("data", Buffer.from(request));
}

/** Let queued microtasks and zero-delay timers run. */
export const tick = () => new Promise<void>((r) => setTimeout(r, 0));

export interface AutoRespondOptions {
  initResult?: Record<string, unknown>;
  sessionResult?: Record<string, unknown>;
  /** Stream these chunks as agent_message_chunk updates, then end the turn. */
  promptReply?: string[];
  stopReason?: string;
  /** Never answer session/prompt. */
  hangOnPrompt?: boolean;
}

/**
 * Auto-responder: watches stdin for JSON-RPC requests and answers
 * initialize, session/new and session/prompt like a cooperative agent.
 */
export function autoRespond(stdin: MockStream, stdout: MockStream, options: AutoRespondOptions = {}): void {
  const defaultInit = {
    protocolVersion: 1,
    agentCapabilities: { loadSession: false },
    agentInfo: { name: "test-agent", version: "1.0" },
    ...options.initResult,
  };
  const defaultSession = { sessionId: "sess-1", ...options.sessionResult };

  const origWrite = stdin.write.bind(stdin);
  stdin.write = (data: string, cb?: (err?: Error | null) => void): boolean => {
    const ok = origWrite(data, cb);
    let parsed: { id?: number; method?: string; params?: { sessionId?: string } };
    try {
      parsed = JSON.parse(data.trim()) as typeof parsed;
    } catch {
      return ok;
    }
    const { id, method } = parsed;
    if (id === undefined) return ok;

    if (method === "initialize") {
      setTimeout(() => respondToRequest(stdout, id, defaultInit), 0);
    } else if (method === "session/new") {
      setTimeout(() => respondToRequest(stdout, id, defaultSession), 0);
    } else if (method === "session/prompt" && !options.hangOnPrompt) {
      const sessionId = parsed.params?.sessionId ?? defaultSession.sessionId;
      setTimeout(() => {
        for (const text of options.promptReply ?? ["done"]) {
          sendNotification(stdout, "session/update", {
            sessionId,
            update: { sessionUpdate: "agent_message_chunk", content: { type: "text", text } },
          });
        }
        respondToRequest(stdout, id, { stopReason: options.stopReason ?? "end_turn" });
      }, 0);
    }
    return ok;
  };
}
