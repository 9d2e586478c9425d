import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { parseCliArgs } from "./cli-args.js";

describe("parseCliArgs", () => {
  it("defaults to no flags and a stdin prompt", () => {
    expect(parseCliArgs([])).toEqual({ help: false, version: false, verbose: false, config: {} });
  });

  it("joins positionals into the prompt", () => {
    expect(parseCliArgs(["fix", "the", "tests"]).prompt).toBe("fix the tests");
  });

  it("maps flags onto adapter config", () => {
    const options = parseCliArgs([
      "--agent",
      "gemini",
      "--agent-arg",
      "--experimental-acp",
      "--cwd",
      "/tmp/work",
      "--timeout-ms",
      "60000",
      "--permission-mode",
      "allowlist",
      "--allow",
      "fs/*",
      "--allow",
      "/^terminal/",
      "-v",
      "do it",
    ]);

    expect(options).toEqual({
      help: false,
      version: false,
      verbose: true,
      prompt: "do it",
      config: {
        agentCommand: "gemini",
        agentArgs: ["--experimental-acp"],
        cwd: "/tmp/work",
        timeoutMs: 60000,
        permissionMode: "allowlist",
        permissionAllowlist: ["fs/*", "/^terminal/"],
      },
    });
  });

  it("treats everything after -- as prompt", () => {
    expect(parseCliArgs(["-v", "--", "--help", "me"])).toMatchObject({
      help: false,
      verbose: true,
      prompt: "--help me",
    });
  });

  it("recognizes help and version", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--version"]).version).toBe(true);
  });

  it.each([
    [["--bogus"], "Unknown option: --bogus"],
    [["--agent"], "--agent requires a value"],
    [["--cwd", "--verbose"], "--cwd requires a value"],
    [["--timeout-ms", "soon"], '--timeout-ms requires a positive integer, got "soon"'],
    [["--timeout-ms", "0"], '--timeout-ms requires a positive integer, got "0"'],
    [
      ["--permission-mode", "yolo"],
      "Invalid permission mode: yolo. Valid modes: auto_approve, deny_all, allowlist, interactive",
    ],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new ConfigurationError(message));
  });
});
