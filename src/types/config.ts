import { adapterConfigSchema, type PERMISSION_MODES } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";

export type PermissionMode = (typeof PERMISSION_MODES)[number];

/** ACP adapter configuration; every field has a default. */
export interface AdapterConfig {
  /** Executable that speaks ACP on stdio (default: "gemini") */
  agentCommand?: string;
  agentArgs?: string[];
  /** Working directory for the agent and the session (default: process.cwd()) */
  cwd?: string;
  /** Extra environment variables merged over process.env */
  env?: Record<string, string>;

  // Timeouts
  timeoutMs?: number; // default: 300000 (per request)
  shutdownGracePeriodMs?: number; // default: 5000 (SIGTERM → SIGKILL in stop())
  killGracePeriodMs?: number; // default: 3000 (SIGTERM → SIGKILL in the signal path)

  // Permissions
  permissionMode?: PermissionMode; // default: "auto_approve"
  permissionAllowlist?: string[];
  historyLimit?: number; // default: 1000 decisions
}

export type ResolvedAdapterConfig = Required<Omit<AdapterConfig, "env">> &
  Pick<AdapterConfig, "env">;

export const DEFAULT_ADAPTER_CONFIG: Omit<ResolvedAdapterConfig, "cwd"> = {
  agentCommand: "gemini",
  agentArgs: [],
  timeoutMs: 300_000,
  shutdownGracePeriodMs: 5000,
  killGracePeriodMs: 3000,
  permissionMode: "auto_approve",
  permissionAllowlist: [],
  historyLimit: 1000,
};

/** Validate user input, then fill defaults. Throws ConfigurationError on invalid input. */
export function resolveAdapterConfig(config: AdapterConfig = {}): ResolvedAdapterConfig {
  const validation = adapterConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigurationError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const input = validation.data;
  return {
    agentCommand: input.agentCommand ?? DEFAULT_ADAPTER_CONFIG.agentCommand,
    agentArgs: [...(input.agentArgs ?? DEFAULT_ADAPTER_CONFIG.agentArgs)],
    cwd: input.cwd ?? process.cwd(),
    env: input.env,
    timeoutMs: input.timeoutMs ?? DEFAULT_ADAPTER_CONFIG.timeoutMs,
    shutdownGracePeriodMs:
      input.shutdownGracePeriodMs ?? DEFAULT_ADAPTER_CONFIG.shutdownGracePeriodMs,
    killGracePeriodMs: input.killGracePeriodMs ?? DEFAULT_ADAPTER_CONFIG.killGracePeriodMs,
    permissionMode: input.permissionMode ?? DEFAULT_ADAPTER_CONFIG.permissionMode,
    permissionAllowlist: [
      ...(input.permissionAllowlist ?? DEFAULT_ADAPTER_CONFIG.permissionAllowlist),
    ],
    historyLimit: input.historyLimit ?? DEFAULT_ADAPTER_CONFIG.historyLimit,
  };
}

const ENV_PREFIX = "LOOPWRIGHT_ACP_";

/**
 * Read adapter settings from environment variables. Values that are absent
 * stay undefined so explicit options can be layered on top.
 */
export function adapterConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AdapterConfig {
  const config: Record<string, unknown> = {};
  const read = (key: string) => {
    const value = env[`${ENV_PREFIX}${key}`]?.trim();
    return value ? value : undefined;
  };

  const command = read("COMMAND");
  if (command) config.agentCommand = command;

  const args = read("ARGS");
  if (args) config.agentArgs = args.split(/\s+/);

  const timeout = read("TIMEOUT_MS");
  if (timeout) config.timeoutMs = Number(timeout);

  const mode = read("PERMISSION_MODE");
  if (mode) config.permissionMode = mode;

  const allowlist = read("ALLOWLIST");
  if (allowlist) {
    config.permissionAllowlist = allowlist
      .split(",")
      .map((p) => p.trim())
      .filter(Boolean);
  }

  // Validate here so a bad variable names itself instead of failing later
  const validation = adapterConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigurationError(
      `Invalid configuration from ${ENV_PREFIX}* environment: ${validation.error.message}`,
      { cause: validation.error },
    );
  }
  return validation.data;
}
