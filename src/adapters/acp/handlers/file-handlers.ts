import { randomUUID } from "node:crypto";
import { chmod, mkdir, readFile, realpath, rename, stat, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, join } from "node:path";
import { errorMessage } from "../../../errors.js";
import type { Logger } from "../../../interfaces/logger.js";
import { noopLogger } from "../../../utils/noop-logger.js";
import { JsonRpcErrorCode } from "../json-rpc.js";
import {
  type HandlerError,
  handlerError,
  invalidParams,
  isRecord,
  missingParam,
  requireString,
} from "./handler-error.js";

export interface ReadTextFileResult {
  /** null when the file does not exist */
  content: string | null;
  exists: boolean;
}

export interface WriteTextFileResult {
  success: true;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isMissing(err: unknown): boolean {
  return isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** stat() that maps a missing path to undefined. */
async function statIfExists(path: string) {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissing(err)) return undefined;
    throw err;
  }
}

/** Follow symlinks; a path that does not exist yet resolves to itself. */
async function resolveTarget(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (isMissing(err)) return path;
    throw err;
  }
}

function absolutePath(params: unknown): string | HandlerError {
  if (!isRecord(params)) return missingParam("path");
  const path = requireString(params, "path");
  if (typeof path !== "string") return path;
  if (!isAbsolute(path)) return invalidParams(`Path must be absolute: ${path}`);
  return path;
}

function optionalPositiveInt(value: unknown, name: string): number | undefined | HandlerError {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    return invalidParams(`${name} must be a positive integer`);
  }
  return value;
}

/** Slice text by 1-based line number and line count. */
function sliceLines(content: string, line: number | undefined, limit: number | undefined): string {
  if (line === undefined && limit === undefined) return content;
  const lines = content.split("\n");
  const start = (line ?? 1) - 1;
  const end = limit === undefined ? lines.length : start + limit;
  return lines.slice(start, end).join("\n");
}

/**
 * Answers `fs/read_text_file` and `fs/write_text_file`. Paths must be
 * absolute; domain failures come back as HandlerError values.
 */
export class FileHandlers {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  async readTextFile(params: unknown): Promise<ReadTextFileResult | HandlerError> {
    const path = absolutePath(params);
    if (typeof path !== "string") return path;

    const record = isRecord(params) ? params : {};
    const line = optionalPositiveInt(record.line, "line");
    if (typeof line === "object") return line;
    const limit = optionalPositiveInt(record.limit, "limit");
    if (typeof limit === "object") return limit;

    try {
      const stats = await statIfExists(path);
      if (!stats) return { content: null, exists: false };
      if (!stats.isFile()) {
        return handlerError(JsonRpcErrorCode.INVALID_RESOURCE_STATE, `Path is not a file: ${path}`);
      }
      const content = await readFile(path, "utf-8");
      this.logger.debug?.("Read file for agent", { path, bytes: stats.size });
      return { content: sliceLines(content, line, limit), exists: true };
    } catch (err) {
      this.logger.warn("Failed to read file for agent", { path, error: errorMessage(err) });
      return handlerError(JsonRpcErrorCode.INTERNAL_ERROR, `Failed to read file: ${errorMessage(err)}`);
    }
  }

  async writeTextFile(params: unknown): Promise<WriteTextFileResult | HandlerError> {
    const path = absolutePath(params);
    if (typeof path !== "string") return path;

    const content = isRecord(params) ? params.content : undefined;
    if (content === undefined || content === null) return missingParam("content");
    if (typeof content !== "string") return invalidParams("content must be a string");

    try {
      const stats = await statIfExists(path);
      if (stats?.isDirectory()) {
        return handlerError(JsonRpcErrorCode.INVALID_RESOURCE_STATE, `Path is a directory: ${path}`);
      }
      await mkdir(dirname(path), { recursive: true });
      await writeAtomic(path, content);
      this.logger.debug?.("Wrote file for agent", { path, length: content.length });
      return { success: true };
    } catch (err) {
      this.logger.warn("Failed to write file for agent", { path, error: errorMessage(err) });
      return handlerError(JsonRpcErrorCode.INTERNAL_ERROR, `Failed to write file: ${errorMessage(err)}`);
    }
  }
}

/**
 * Write to a temp file beside the file a path resolves to, then rename it
 * into place. A symlinked path stays a symlink and an existing file keeps
 * its permission bits.
 */
async function writeAtomic(path: string, content: string): Promise<void> {
  const target = await resolveTarget(path);
  const existing = await statIfExists(target);
  const tmp = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmp, content, "utf-8");
    if (existing) await chmod(tmp, existing.mode & 0o7777);
    await rename(tmp, target);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw err;
  }
}
