import { z } from "zod";

export const PERMISSION_MODES = ["auto_approve", "deny_all", "allowlist", "interactive"] as const;

const positiveMs = z.number().int().positive();

export const permissionModeSchema = z.enum(PERMISSION_MODES);

export const adapterConfigSchema = z
  .object({
    agentCommand: z.string().min(1).optional(),
    agentArgs: z.array(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string()).optional(),

    // Timeouts
    timeoutMs: positiveMs.optional(),
    shutdownGracePeriodMs: positiveMs.optional(),
    killGracePeriodMs: positiveMs.optional(),

    // Permissions
    permissionMode: permissionModeSchema.optional(),
    permissionAllowlist: z.array(z.string()).optional(),
    historyLimit: z.number().int().min(1).optional(),
  })
  .strict();
