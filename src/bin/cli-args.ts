import { permissionModeSchema } from "../config/config-schema.js";
import { ConfigurationError } from "../errors.js";
import type { AdapterConfig } from "../types/config.js";

export interface CliOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  /** Prompt from positional arguments; undefined means read stdin. */
  prompt?: string;
  /** Only the settings given on the command line. */
  config: AdapterConfig;
}

export const HELP_TEXT = `
  loopwright-acp: run one prompt through an ACP agent

  Usage: loopwright-acp [options] [--] <prompt...>
         echo "<prompt>" | loopwright-acp [options]

  Options:
    --agent <cmd>            ACP agent executable (default: "gemini")
    --agent-arg <arg>        Argument for the agent (repeatable)
    --cwd <path>             Working directory for the agent session
    --timeout-ms <n>         Per-request timeout in milliseconds
    --permission-mode <m>    auto_approve | deny_all | allowlist | interactive
    --allow <pattern>        Allowlist pattern: exact, glob or /regex/ (repeatable)
    --verbose, -v            Debug logging on stderr
    --version                Print the version
    --help, -h               Show this help

  Environment (overridden by flags):
    LOOPWRIGHT_ACP_COMMAND, LOOPWRIGHT_ACP_ARGS, LOOPWRIGHT_ACP_TIMEOUT_MS,
    LOOPWRIGHT_ACP_PERMISSION_MODE, LOOPWRIGHT_ACP_ALLOWLIST, LOOPWRIGHT_LOG_LEVEL
`;

/** Parse argv without the node and script entries. Throws ConfigurationError. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, version: false, verbose: false, config: {} };
  const config = options.config;
  const positionals: string[] = [];

  // Agent arguments are often flags themselves
  const valueOf = (flag: string, index: number, acceptFlag = false): string => {
    const value = argv[index];
    if (value === undefined || (!acceptFlag && value.startsWith("--"))) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    switch (arg) {
      case "--agent":
        config.agentCommand = valueOf(arg, ++i);
        break;
      case "--agent-arg":
        config.agentArgs = [...(config.agentArgs ?? []), valueOf(arg, ++i, true)];
        break;
      case "--cwd":
        config.cwd = valueOf(arg, ++i);
        break;
      case "--timeout-ms": {
        const raw = valueOf(arg, ++i);
        const timeoutMs = Number(raw);
        if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
          throw new ConfigurationError(`--timeout-ms requires a positive integer, got "${raw}"`);
        }
        config.timeoutMs = timeoutMs;
        break;
      }
      case "--permission-mode": {
        const mode = permissionModeSchema.safeParse(valueOf(arg, ++i));
        if (!mode.success) {
          throw new ConfigurationError(
            `Invalid permission mode: ${argv[i]}. Valid modes: ${permissionModeSchema.options.join(", ")}`,
          );
        }
        config.permissionMode = mode.data;
        break;
      }
      case "--allow":
        config.permissionAllowlist = [...(config.permissionAllowlist ?? []), valueOf(arg, ++i)];
        break;
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--version":
        options.version = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--":
        positionals.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith("-")) throw new ConfigurationError(`Unknown option: ${arg}`);
        positionals.push(arg);
    }
  }

  if (positionals.length > 0) options.prompt = positionals.join(" ");
  return options;
}
