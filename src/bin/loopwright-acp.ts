#!/usr/bin/env node
import { AcpAdapter } from "../adapters/acp/acp-adapter.js";
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { adapterConfigFromEnv } from "../types/config.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";
import { HELP_TEXT, parseCliArgs } from "./cli-args.js";

// ── Prompt input ───────────────────────────────────────────────────────────

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8").trim();
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }
  if (options.version) {
    console.log(resolvePackageVersion(import.meta.url, ["../../package.json"]));
    return 0;
  }

  const logger = new StructuredLogger({
    component: "loopwright-acp",
    level: options.verbose
      ? LogLevel.DEBUG
      : parseLogLevel(process.env.LOOPWRIGHT_LOG_LEVEL, LogLevel.WARN),
  });

  const prompt = options.prompt ?? (process.stdin.isTTY ? "" : await readStdin());
  if (!prompt) {
    console.error("Error: no prompt given.\nPass it as arguments or on stdin; run with --help for usage.");
    return 1;
  }

  // Flags win over the environment
  const adapter = new AcpAdapter(
    { ...adapterConfigFromEnv(), ...options.config },
    { logger: logger.child("acp"), onPermissionLog: (line) => process.stderr.write(`${line}\n`) },
  );
  if (!adapter.available) {
    console.error(`Error: ACP agent "${adapter.config.agentCommand}" not found in PATH.`);
    return 1;
  }

  adapter.registerSignalHandlers();
  try {
    const result = await adapter.execute(prompt);
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    logger.info("Permission summary", { ...adapter.getPermissionStats() });
    return result.success ? 0 : 1;
  } finally {
    await adapter.shutdown();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    if (err instanceof ConfigurationError) console.error("Run with --help for usage.");
    process.exitCode = 1;
  },
);
