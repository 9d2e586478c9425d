/**
 * AcpSession: state accumulated from `session/update` notifications.
 *
 * One session per successful handshake. The adapter calls `beginTurn()` before
 * each prompt so `output` and `thoughts` describe only the latest turn; tool
 * calls and the plan are keyed by the agent's own ids and carry over.
 */

import { z } from "zod";

export interface AcpToolCall {
  toolCallId: string;
  title?: string;
  kind?: string;
  status?: string;
  rawInput?: unknown;
  rawOutput?: unknown;
  content?: unknown;
}

export interface AcpPlanEntry {
  content: string;
  priority?: string;
  status?: string;
}

export interface AcpSessionSnapshot {
  sessionId: string;
  output: string;
  thoughts: string;
  toolCalls: AcpToolCall[];
  plan: AcpPlanEntry[];
  stopReason: string | undefined;
  updateCount: number;
}

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

const contentBlockSchema = z.object({ type: z.string(), text: z.string().optional() }).passthrough();

/** `content` arrives as one block, a list of blocks, or (from older agents) bare text. */
const chunkContentSchema = z.union([z.string(), contentBlockSchema, z.array(contentBlockSchema)]);

const updateSchema = z
  .object({
    sessionUpdate: z.string(),
    content: z.unknown().optional(),
    toolCallId: z.string().optional(),
    title: z.string().optional(),
    kind: z.string().optional(),
    status: z.string().optional(),
    rawInput: z.unknown().optional(),
    rawOutput: z.unknown().optional(),
    entries: z
      .array(
        z
          .object({
            content: z.string(),
            priority: z.string().optional(),
            status: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

type SessionUpdate = z.infer<typeof updateSchema>;

const nestedEnvelopeSchema = z.object({ sessionId: z.string().optional(), update: updateSchema });
const flatEnvelopeSchema = updateSchema.extend({ sessionId: z.string().optional() });

/** Nested `{ sessionId, update: {...} }` per ACP, or the flat form some agents send. */
function readEnvelope(params: unknown): { sessionId?: string; update: SessionUpdate } | undefined {
  const nested = nestedEnvelopeSchema.safeParse(params);
  if (nested.success) return nested.data;
  const flat = flatEnvelopeSchema.safeParse(params);
  if (flat.success) return { sessionId: flat.data.sessionId, update: flat.data };
  return undefined;
}

function chunkText(content: unknown): string {
  const parsed = chunkContentSchema.safeParse(content);
  if (!parsed.success) return "";
  if (typeof parsed.data === "string") return parsed.data;
  const blocks = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return blocks.map((b) => (b.type === "text" && b.text !== undefined ? b.text : "")).join("");
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class AcpSession {
  readonly sessionId: string;

  private messageChunks: string[] = [];
  private thoughtChunks: string[] = [];
  private readonly toolCallsById = new Map<string, AcpToolCall>();
  private planEntries: AcpPlanEntry[] = [];
  private lastStopReason: string | undefined;
  private updates = 0;

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  /**
   * Apply one `session/update` payload. Returns false when the payload is
   * malformed or addressed to another session.
   */
  processUpdate(params: unknown): boolean {
    const envelope = readEnvelope(params);
    if (!envelope) return false;
    if (envelope.sessionId !== undefined && envelope.sessionId !== this.sessionId) return false;
    const { update } = envelope;

    this.updates++;
    switch (update.sessionUpdate) {
      case "agent_message_chunk":
        this.messageChunks.push(chunkText(update.content));
        break;
      case "agent_thought_chunk":
        this.thoughtChunks.push(chunkText(update.content));
        break;
      case "tool_call":
      case "tool_call_update":
        this.mergeToolCall(update);
        break;
      case "plan":
        this.planEntries = (update.entries ?? []).map(({ content, priority, status }) => ({
          content,
          ...(priority !== undefined && { priority }),
          ...(status !== undefined && { status }),
        }));
        break;
      default:
        // available_commands_update, current_mode_update, user_message_chunk: nothing to keep
        break;
    }
    return true;
  }

  private mergeToolCall(update: SessionUpdate): void {
    if (update.toolCallId === undefined) return;
    const existing = this.toolCallsById.get(update.toolCallId) ?? { toolCallId: update.toolCallId };
    // Updates only carry the fields that changed
    this.toolCallsById.set(update.toolCallId, {
      ...existing,
      ...(update.title !== undefined && { title: update.title }),
      ...(update.kind !== undefined && { kind: update.kind }),
      ...(update.status !== undefined && { status: update.status }),
      ...(update.rawInput !== undefined && { rawInput: update.rawInput }),
      ...(update.rawOutput !== undefined && { rawOutput: update.rawOutput }),
      ...(update.content !== undefined && { content: update.content }),
    });
  }

  /** Reset per-turn text before sending a new prompt. */
  beginTurn(): void {
    this.messageChunks = [];
    this.thoughtChunks = [];
    this.lastStopReason = undefined;
  }

  endTurn(stopReason: string | undefined): void {
    this.lastStopReason = stopReason;
  }

  get output(): string {
    return this.messageChunks.join("");
  }

  get thoughts(): string {
    return this.thoughtChunks.join("");
  }

  get toolCalls(): AcpToolCall[] {
    return [...this.toolCallsById.values()];
  }

  get plan(): AcpPlanEntry[] {
    return [...this.planEntries];
  }

  get stopReason(): string | undefined {
    return this.lastStopReason;
  }

  get updateCount(): number {
    return this.updates;
  }

  snapshot(): AcpSessionSnapshot {
    return {
      sessionId: this.sessionId,
      output: this.output,
      thoughts: this.thoughts,
      toolCalls: this.toolCalls,
      plan: this.plan,
      stopReason: this.stopReason,
      updateCount: this.updateCount,
    };
  }
}
