/**
 * Line framing for newline-delimited JSON arriving over a pipe.
 *
 * Subprocess stdout delivers arbitrary chunks that may split a JSON line, or
 * even a UTF-8 multi-byte character, across reads. The buffer accumulates
 * partial data and yields complete lines.
 */
export class NDJSONLineBuffer {
  private buffer = "";
  private decoder = new TextDecoder("utf-8", { fatal: false });

  /**
   * Feed raw bytes or a string into the buffer.
   * Returns the complete, non-blank lines (trimmed, `\r\n` tolerated).
   */
  feed(chunk: string | Uint8Array): string[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.buffer += text;

    const lines: string[] = [];
    let newlineIdx = this.buffer.indexOf("\n");
    while (newlineIdx !== -1) {
      const line = this.buffer.slice(0, newlineIdx).trim();
      this.buffer = this.buffer.slice(newlineIdx + 1);
      newlineIdx = this.buffer.indexOf("\n");
      if (line) lines.push(line);
    }

    return lines;
  }

  /** Remaining unterminated line, if any (e.g. when the stream closes). */
  flush(): string | null {
    const remaining = (this.buffer + this.decoder.decode()).trim();
    this.buffer = "";
    return remaining || null;
  }

  /** Current buffer size in characters. */
  get size(): number {
    return this.buffer.length;
  }
}

/** Serialize a value as one NDJSON line. */
export function serializeNDJSON(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}
