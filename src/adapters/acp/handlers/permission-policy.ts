/**
 * Permission decisions for `session/request_permission`.
 *
 * Four modes: auto_approve, deny_all, allowlist and interactive. Every
 * decision lands in a capped history; counts are derived from it.
 */

import * as readline from "node:readline";
import { permissionModeSchema } from "../../../config/config-schema.js";
import { ConfigurationError, errorMessage } from "../../../errors.js";
import type { Logger } from "../../../interfaces/logger.js";
import type { PermissionMode } from "../../../types/config.js";
import { noopLogger } from "../../../utils/noop-logger.js";
import { RingBuffer } from "../../../utils/ring-buffer.js";
import { isRecord } from "./handler-error.js";

export interface PermissionOption {
  /** ACP key */
  optionId?: string;
  /** Older agents send `id` */
  id?: string;
  kind?: string;
  type?: string;
  name?: string;
}

export interface PermissionRequest {
  operation: string;
  path?: string;
  command?: string;
  /** The raw params, as received. */
  arguments: Record<string, unknown>;
  options: PermissionOption[];
}

export interface PermissionDecision {
  approved: boolean;
  reason: string;
  mode: PermissionMode;
  timestamp: number;
}

export interface PermissionHistoryEntry {
  request: PermissionRequest;
  decision: PermissionDecision;
}

export type PermissionOutcome =
  | { outcome: { outcome: "selected"; optionId: string } }
  | { outcome: { outcome: "cancelled" } };

/** Ask the user a question; resolves null on interrupt or end of input. */
export type PromptFn = (question: string) => Promise<string | null>;

export interface PermissionPolicyOptions {
  mode?: PermissionMode;
  allowlist?: string[];
  historyLimit?: number;
  /** Receives one "[PERMISSION] APPROVED|DENIED <operation>: <reason>" line per decision. */
  onPermissionLog?: (line: string) => void;
  logger?: Logger;
  /** Interactive mode only prompts when this returns true (default: stdin is a TTY). */
  isTTY?: () => boolean;
  prompt?: PromptFn;
}

const DEFAULT_HISTORY_LIMIT = 1000;

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function commandString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    const parts = value.filter((v): v is string => typeof v === "string");
    return parts.length > 0 ? parts.join(" ") : undefined;
  }
  return optionalString(value);
}

function parseOptions(value: unknown): PermissionOption[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((o) => ({
    optionId: optionalString(o.optionId),
    id: optionalString(o.id),
    kind: optionalString(o.kind),
    type: optionalString(o.type),
    name: optionalString(o.name),
  }));
}

/**
 * Normalize raw params. ACP agents describe the action as a `toolCall`; the
 * operation then falls back to its kind or title.
 */
export function parsePermissionRequest(params: unknown): PermissionRequest {
  const args = isRecord(params) ? params : {};
  const toolCall = isRecord(args.toolCall) ? args.toolCall : undefined;
  const rawInput = toolCall && isRecord(toolCall.rawInput) ? toolCall.rawInput : undefined;
  const firstLocation =
    toolCall && Array.isArray(toolCall.locations) ? toolCall.locations.find(isRecord) : undefined;

  return {
    operation:
      optionalString(args.operation) ??
      optionalString(toolCall?.kind) ??
      optionalString(toolCall?.title) ??
      "",
    path: optionalString(args.path) ?? optionalString(firstLocation?.path) ?? optionalString(rawInput?.path),
    command: commandString(args.command) ?? commandString(rawInput?.command),
    arguments: args,
    options: parseOptions(args.options),
  };
}

// ---------------------------------------------------------------------------
// Allowlist patterns
// ---------------------------------------------------------------------------

type Matcher = (operation: string) => boolean;

function globToRegExp(glob: string): RegExp {
  let source = "";
  for (const ch of glob) {
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(/[.+^${}()|[\]\\/]/g, "\\$&");
  }
  return new RegExp(`^${source}$`, "s");
}

/**
 * Compile one allowlist entry: `/regex/`, glob (`*`, `?`) or exact string.
 * An invalid regex compiles to a matcher that never matches.
 */
export function compilePattern(pattern: string, logger: Logger = noopLogger): Matcher {
  if (pattern.length > 2 && pattern.startsWith("/") && pattern.endsWith("/")) {
    try {
      const re = new RegExp(pattern.slice(1, -1));
      return (op) => re.test(op);
    } catch (err) {
      logger.warn("Invalid allowlist regex never matches", { pattern, error: errorMessage(err) });
      return () => false;
    }
  }
  if (pattern.includes("*") || pattern.includes("?")) {
    const re = globToRegExp(pattern);
    return (op) => re.test(op);
  }
  return (op) => op === pattern;
}

export function matchesPattern(operation: string, pattern: string): boolean {
  return compilePattern(pattern)(operation);
}

// ---------------------------------------------------------------------------
// Interactive prompt
// ---------------------------------------------------------------------------

/** Prompt on stderr so stdout stays free for program output. */
export const readlinePrompt: PromptFn = (question) =>
  new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
    let settled = false;
    const finish = (answer: string | null) => {
      if (settled) return;
      settled = true;
      rl.close();
      resolve(answer);
    };
    rl.on("SIGINT", () => finish(null));
    rl.on("close", () => finish(null));
    rl.question(question, (answer) => finish(answer));
  });

function isApproval(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export class PermissionPolicy {
  readonly mode: PermissionMode;
  readonly allowlist: readonly string[];
  readonly onPermissionLog: ((line: string) => void) | undefined;

  private readonly matchers: Array<{ pattern: string; matches: Matcher }>;
  private readonly history: RingBuffer<PermissionHistoryEntry>;
  private readonly logger: Logger;
  private readonly isTTY: () => boolean;
  private readonly prompt: PromptFn;
  /** Settles when the current interactive prompt has been answered. */
  private promptQueue: Promise<void> = Promise.resolve();

  constructor(options: PermissionPolicyOptions = {}) {
    const mode = permissionModeSchema.safeParse(options.mode ?? "auto_approve");
    if (!mode.success) {
      throw new ConfigurationError(
        `Invalid permission mode: ${String(options.mode)}. Valid modes: ${permissionModeSchema.options.join(", ")}`,
      );
    }
    this.mode = mode.data;
    this.allowlist = [...(options.allowlist ?? [])];
    this.onPermissionLog = options.onPermissionLog;
    this.logger = options.logger ?? noopLogger;
    this.isTTY = options.isTTY ?? (() => process.stdin.isTTY === true);
    this.prompt = options.prompt ?? readlinePrompt;
    this.history = new RingBuffer(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.matchers = this.allowlist.map((pattern) => ({
      pattern,
      matches: compilePattern(pattern, this.logger),
    }));
  }

  /** Answer a `session/request_permission` call. */
  async handleRequestPermission(params: unknown): Promise<PermissionOutcome> {
    const request = parsePermissionRequest(params);
    const decision = await this.decide(request);
    this.record(request, decision);

    if (!decision.approved) return { outcome: { outcome: "cancelled" } };
    const optionId = selectAllowOption(request.options);
    if (optionId === undefined) return { outcome: { outcome: "cancelled" } };
    return { outcome: { outcome: "selected", optionId } };
  }

  async decide(request: PermissionRequest): Promise<PermissionDecision> {
    const decision = (approved: boolean, reason: string): PermissionDecision => ({
      approved,
      reason,
      mode: this.mode,
      timestamp: Date.now(),
    });

    switch (this.mode) {
      case "auto_approve":
        return decision(true, "auto_approve mode");
      case "deny_all":
        return decision(false, "deny_all mode");
      case "allowlist": {
        const hit = this.matchers.find((m) => m.matches(request.operation));
        return hit
          ? decision(true, `Matches allowlist pattern: ${hit.pattern}`)
          : decision(false, "No matching allowlist pattern");
      }
      case "interactive": {
        // One prompt at a time, so each typed line answers exactly one request
        const answered = this.promptQueue.then(() => this.askUser(request, decision));
        this.promptQueue = answered.then(
          () => undefined,
          () => undefined,
        );
        return answered;
      }
    }
  }

  private async askUser(
    request: PermissionRequest,
    decision: (approved: boolean, reason: string) => PermissionDecision,
  ): Promise<PermissionDecision> {
    if (!this.isTTY()) return decision(false, "No terminal available for interactive approval");

    const details = [request.operation, request.path, request.command].filter(Boolean).join(" ");
    let answer: string | null;
    try {
      answer = await this.prompt(`Allow ${details}? [y/N] `);
    } catch (err) {
      this.logger.warn("Permission prompt failed", { error: errorMessage(err) });
      return decision(false, `Prompt failed: ${errorMessage(err)}`);
    }

    if (answer === null) return decision(false, "Prompt interrupted");
    return isApproval(answer) ? decision(true, "User approved") : decision(false, "User denied");
  }

  private record(request: PermissionRequest, decision: PermissionDecision): void {
    this.history.push({ request, decision });
    const verdict = decision.approved ? "APPROVED" : "DENIED";
    this.logger.info("Permission decision", {
      operation: request.operation,
      approved: decision.approved,
      mode: decision.mode,
    });
    this.onPermissionLog?.(`[PERMISSION] ${verdict} ${request.operation}: ${decision.reason}`);
  }

  // ---------------------------------------------------------------------------
  // History
  // ---------------------------------------------------------------------------

  /** Oldest first. The returned array is a copy. */
  getHistory(): PermissionHistoryEntry[] {
    return this.history.toArray();
  }

  clearHistory(): void {
    this.history.clear();
  }

  get approvedCount(): number {
    return this.history.countWhere((e) => e.decision.approved);
  }

  get deniedCount(): number {
    return this.history.countWhere((e) => !e.decision.approved);
  }
}

/** First option whose kind is `allow_*`, else the first option; its id verbatim. */
export function selectAllowOption(options: readonly PermissionOption[]): string | undefined {
  const idOf = (o: PermissionOption) => o.optionId ?? o.id;
  const allow = options.find(
    (o) => idOf(o) !== undefined && (o.kind ?? o.type ?? "").startsWith("allow"),
  );
  if (allow) return idOf(allow);
  for (const option of options) {
    const id = idOf(option);
    if (id !== undefined) return id;
  }
  return undefined;
}
