import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string().min(1) }).passthrough();

/**
 * Return the `version` of the first readable package.json among
 * `candidates`, resolved relative to `fromUrl` (an `import.meta.url`).
 * Falls back to "unknown".
 */
export function resolvePackageVersion(fromUrl: string, candidates: readonly string[]): string {
  for (const candidate of candidates) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(new URL(candidate, fromUrl), "utf-8"));
    } catch {
      continue;
    }
    const parsed = packageJsonSchema.safeParse(raw);
    if (parsed.success) return parsed.data.version;
  }
  return "unknown";
}
