import * as fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../../../errors.js";
import type { PermissionMode } from "../../../types/config.js";
import {
  compilePattern,
  matchesPattern,
  parsePermissionRequest,
  PermissionPolicy,
  selectAllowOption,
} from "./permission-policy.js";

const allowOption = [{ optionId: "allow-once", kind: "allow_once", name: "Allow" }];

function request(operation: string, extra: Record<string, unknown> = {}) {
  return { operation, options: allowOption, ...extra };
}

describe("parsePermissionRequest", () => {
  it("reads operation, path and command", () => {
    const params = { operation: "terminal/execute", path: "/repo", command: "ls -la" };
    const req = parsePermissionRequest(params);

    expect(req.operation).toBe("terminal/execute");
    expect(req.path).toBe("/repo");
    expect(req.command).toBe("ls -la");
    expect(req.arguments).toBe(params);
  });

  it("defaults to an empty operation", () => {
    expect(parsePermissionRequest({})).toEqual({
      operation: "",
      path: undefined,
      command: undefined,
      arguments: {},
      options: [],
    });
    expect(parsePermissionRequest(null).operation).toBe("");
  });

  it("derives the operation and path from an ACP toolCall", () => {
    const req = parsePermissionRequest({
      sessionId: "sess-1",
      toolCall: {
        toolCallId: "call-1",
        kind: "edit",
        title: "Edit main.ts",
        locations: [{ path: "/repo/main.ts" }],
        rawInput: { command: ["git", "status"] },
      },
      options: [{ optionId: "ok", kind: "allow_once", name: "Allow" }],
    });

    expect(req.operation).toBe("edit");
    expect(req.path).toBe("/repo/main.ts");
    expect(req.command).toBe("git status");
    expect(req.options).toEqual([
      { optionId: "ok", id: undefined, kind: "allow_once", type: undefined, name: "Allow" },
    ]);
  });

  it("falls back to the toolCall title", () => {
    expect(parsePermissionRequest({ toolCall: { title: "Run tests" } }).operation).toBe("Run tests");
  });
});

describe("selectAllowOption", () => {
  it("prefers the first allow_* option", () => {
    expect(
      selectAllowOption([
        { optionId: "reject", kind: "reject_once" },
        { optionId: "always", kind: "allow_always" },
        { optionId: "once", kind: "allow_once" },
      ]),
    ).toBe("always");
  });

  it("accepts the legacy id/type keys", () => {
    expect(selectAllowOption([{ id: "proceed_once", type: "allow" }])).toBe("proceed_once");
  });

  it("falls back to the first option with an id", () => {
    expect(selectAllowOption([{ name: "no id" }, { optionId: "first", kind: "reject_once" }])).toBe(
      "first",
    );
  });

  it("returns undefined without options", () => {
    expect(selectAllowOption([])).toBeUndefined();
  });
});

describe("allowlist patterns", () => {
  it("glob fs/* matches fs operations only", () => {
    expect(matchesPattern("fs/read_text_file", "fs/*")).toBe(true);
    expect(matchesPattern("fs/write_text_file", "fs/*")).toBe(true);
    expect(matchesPattern("terminal/execute", "fs/*")).toBe(false);
  });

  it("? matches exactly one character", () => {
    expect(matchesPattern("fs/r_text_file", "fs/?_text_file")).toBe(true);
    expect(matchesPattern("fs/read_text_file", "fs/?_text_file")).toBe(false);
  });

  it("glob must match the whole operation", () => {
    expect(matchesPattern("xfs/read", "fs/*")).toBe(false);
  });

  it("treats regex metacharacters in globs literally", () => {
    expect(matchesPattern("a.b", "a.b")).toBe(true);
    expect(matchesPattern("axb", "a.b")).toBe(false);
    expect(matchesPattern("a.bc", "a.b?")).toBe(true);
    expect(matchesPattern("axbc", "a.b?")).toBe(false);
  });

  it("supports /regex/ patterns", () => {
    expect(matchesPattern("fs/read_text_file", "/^fs\\/.*$/")).toBe(true);
    expect(matchesPattern("terminal/execute", "/^fs\\/.*$/")).toBe(false);
  });

  it("an invalid regex never matches and is logged", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const matches = compilePattern("/[unclosed/", logger);

    expect(matches("[unclosed")).toBe(false);
    expect(matches("anything")).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      "Invalid allowlist regex never matches",
      expect.objectContaining({ pattern: "/[unclosed/" }),
    );
  });

  it("exact patterns match only themselves", () => {
    fc.assert(
      fc.property(
        fc.string().filter((s) => !s.includes("*") && !s.includes("?") && !s.startsWith("/")),
        fc.string(),
        (pattern, other) => {
          expect(matchesPattern(pattern, pattern)).toBe(true);
          expect(matchesPattern(other, pattern)).toBe(other === pattern);
        },
      ),
    );
  });

  it("* matches any operation", () => {
    fc.assert(
      fc.property(fc.string(), (op) => {
        expect(matchesPattern(op, "*")).toBe(true);
      }),
    );
  });
});

describe("PermissionPolicy", () => {
  describe("construction", () => {
    it("defaults to auto_approve with an empty allowlist", () => {
      const policy = new PermissionPolicy();
      expect(policy.mode).toBe("auto_approve");
      expect(policy.allowlist).toEqual([]);
      expect(policy.onPermissionLog).toBeUndefined();
    });

    it("accepts every valid mode", () => {
      for (const mode of ["auto_approve", "deny_all", "allowlist", "interactive"] as const) {
        expect(new PermissionPolicy({ mode }).mode).toBe(mode);
      }
    });

    it("rejects an unknown mode", () => {
      const build = () => new PermissionPolicy({ mode: "yolo" as PermissionMode });
      expect(build).toThrow(ConfigurationError);
      expect(build).toThrow("Invalid permission mode: yolo");
    });
  });

  describe("auto_approve and deny_all", () => {
    it("auto_approve selects the offered option verbatim", async () => {
      const policy = new PermissionPolicy({ mode: "auto_approve" });

      const result = await policy.handleRequestPermission({
        operation: "op1",
        path: "/etc/hosts",
        options: [{ id: "proceed_once", type: "allow" }],
      });

      expect(result).toEqual({ outcome: { outcome: "selected", optionId: "proceed_once" } });
    });

    it("auto_approve without options cancels but records an approval", async () => {
      const policy = new PermissionPolicy();

      const result = await policy.handleRequestPermission({ operation: "op1" });

      expect(result).toEqual({ outcome: { outcome: "cancelled" } });
      expect(policy.approvedCount).toBe(1);
    });

    it("deny_all cancels", async () => {
      const policy = new PermissionPolicy({ mode: "deny_all" });
      await expect(policy.handleRequestPermission(request("op1"))).resolves.toEqual({
        outcome: { outcome: "cancelled" },
      });
    });
  });

  describe("allowlist", () => {
    it("selects for a matching operation and cancels otherwise", async () => {
      const policy = new PermissionPolicy({ mode: "allowlist", allowlist: ["fs/*", "terminal/create"] });

      await expect(policy.handleRequestPermission(request("fs/read_text_file"))).resolves.toEqual({
        outcome: { outcome: "selected", optionId: "allow-once" },
      });
      await expect(policy.handleRequestPermission(request("terminal/create"))).resolves.toEqual({
        outcome: { outcome: "selected", optionId: "allow-once" },
      });
      await expect(policy.handleRequestPermission(request("terminal/kill"))).resolves.toEqual({
        outcome: { outcome: "cancelled" },
      });
    });

    it("an empty allowlist denies everything", async () => {
      const policy = new PermissionPolicy({ mode: "allowlist" });
      const result = await policy.handleRequestPermission(request("fs/read_text_file"));
      expect(result).toEqual({ outcome: { outcome: "cancelled" } });
    });

    it("records which pattern matched", async () => {
      const policy = new PermissionPolicy({ mode: "allowlist", allowlist: ["/^fs\\//"] });
      await policy.handleRequestPermission(request("fs/write_text_file"));
      expect(policy.getHistory()[0]?.decision.reason).toBe("Matches allowlist pattern: /^fs\\//");
    });
  });

  describe("interactive", () => {
    function interactive(answer: string | null | Error, isTTY = true) {
      const prompt = vi.fn(async (_question: string) => {
        if (answer instanceof Error) throw answer;
        return answer;
      });
      const policy = new PermissionPolicy({ mode: "interactive", isTTY: () => isTTY, prompt });
      return { policy, prompt };
    }

    it("denies without prompting when stdin is not a terminal", async () => {
      const { policy, prompt } = interactive("y", false);

      const result = await policy.handleRequestPermission(request("fs/read_text_file"));

      expect(result).toEqual({ outcome: { outcome: "cancelled" } });
      expect(prompt).not.toHaveBeenCalled();
      expect(policy.getHistory()[0]?.decision.reason).toBe(
        "No terminal available for interactive approval",
      );
    });

    it("asks with the operation, path and command", async () => {
      const { policy, prompt } = interactive("y");

      await policy.handleRequestPermission(
        request("terminal/create", { path: "/repo", command: ["npm", "test"] }),
      );

      expect(prompt).toHaveBeenCalledWith("Allow terminal/create /repo npm test? [y/N] ");
    });

    it.each(["y", "Y", "yes", "YES", "Yes", " y "])("approves on %j", async (answer) => {
      const { policy } = interactive(answer);
      await expect(policy.handleRequestPermission(request("op"))).resolves.toEqual({
        outcome: { outcome: "selected", optionId: "allow-once" },
      });
    });

    it.each(["", "n", "no", "maybe", "yess"])("denies on %j", async (answer) => {
      const { policy } = interactive(answer);
      await expect(policy.handleRequestPermission(request("op"))).resolves.toEqual({
        outcome: { outcome: "cancelled" },
      });
    });

    it("denies on interrupt or end of input", async () => {
      const { policy } = interactive(null);
      await expect(policy.handleRequestPermission(request("op"))).resolves.toEqual({
        outcome: { outcome: "cancelled" },
      });
      expect(policy.getHistory()[0]?.decision.reason).toBe("Prompt interrupted");
    });

    it("denies when the prompt itself fails", async () => {
      const { policy } = interactive(new Error("stdin closed"));
      await expect(policy.handleRequestPermission(request("op"))).resolves.toEqual({
        outcome: { outcome: "cancelled" },
      });
      expect(policy.getHistory()[0]?.decision.reason).toBe("Prompt failed: stdin closed");
    });

    it("asks concurrent requests one at a time", async () => {
      const answers: Array<(answer: string | null) => void> = [];
      const prompt = vi.fn(
        (_question: string) =>
          new Promise<string | null>((resolve) => {
            answers.push(resolve);
          }),
      );
      const policy = new PermissionPolicy({ mode: "interactive", isTTY: () => true, prompt });

      const write = policy.handleRequestPermission(request("fs/write_text_file", { path: "/repo/a" }));
      const shell = policy.handleRequestPermission(
        request("terminal/create", { command: ["rm", "-rf", "/x"] }),
      );
      await vi.waitFor(() => expect(prompt).toHaveBeenCalledTimes(1));
      expect(prompt).toHaveBeenLastCalledWith("Allow fs/write_text_file /repo/a? [y/N] ");

      answers[0]?.("y");
      await expect(write).resolves.toEqual({
        outcome: { outcome: "selected", optionId: "allow-once" },
      });
      await vi.waitFor(() => expect(prompt).toHaveBeenCalledTimes(2));
      expect(prompt).toHaveBeenLastCalledWith("Allow terminal/create rm -rf /x? [y/N] ");

      answers[1]?.("n");
      await expect(shell).resolves.toEqual({ outcome: { outcome: "cancelled" } });
      expect(policy.getHistory().map((e) => e.decision.reason)).toEqual([
        "User approved",
        "User denied",
      ]);
    });

    it("keeps asking after a prompt fails", async () => {
      const prompt = vi
        .fn<(question: string) => Promise<string | null>>()
        .mockRejectedValueOnce(new Error("stdin closed"))
        .mockResolvedValueOnce("y");
      const policy = new PermissionPolicy({ mode: "interactive", isTTY: () => true, prompt });

      const [first, second] = await Promise.all([
        policy.handleRequestPermission(request("op")),
        policy.handleRequestPermission(request("op")),
      ]);

      expect(first).toEqual({ outcome: { outcome: "cancelled" } });
      expect(second).toEqual({ outcome: { outcome: "selected", optionId: "allow-once" } });
    });
  });

  describe("history", () => {
    it("starts empty and tracks decisions in order", async () => {
      const policy = new PermissionPolicy();
      expect(policy.getHistory()).toEqual([]);

      await policy.handleRequestPermission(request("op1"));
      await policy.handleRequestPermission(request("op2"));

      const history = policy.getHistory();
      expect(history.map((e) => e.request.operation)).toEqual(["op1", "op2"]);
      expect(history[0]?.decision).toMatchObject({ approved: true, mode: "auto_approve" });
      expect(typeof history[0]?.decision.timestamp).toBe("number");
    });

    it("returns a copy", async () => {
      const policy = new PermissionPolicy();
      await policy.handleRequestPermission(request("op1"));

      policy.getHistory().length = 0;

      expect(policy.getHistory()).toHaveLength(1);
    });

    it("counts approvals and denials", async () => {
      const policy = new PermissionPolicy({ mode: "allowlist", allowlist: ["ok/*"] });

      await policy.handleRequestPermission(request("ok/1"));
      await policy.handleRequestPermission(request("ok/2"));
      await policy.handleRequestPermission(request("no/1"));

      expect(policy.approvedCount).toBe(2);
      expect(policy.deniedCount).toBe(1);
    });

    it("clearHistory resets counts", async () => {
      const policy = new PermissionPolicy();
      await policy.handleRequestPermission(request("op1"));

      policy.clearHistory();

      expect(policy.getHistory()).toEqual([]);
      expect(policy.approvedCount).toBe(0);
    });

    it("keeps only the most recent entries", async () => {
      const policy = new PermissionPolicy({ historyLimit: 2 });
      for (const op of ["a", "b", "c"]) {
        await policy.handleRequestPermission(request(op));
      }
      expect(policy.getHistory().map((e) => e.request.operation)).toEqual(["b", "c"]);
    });
  });

  describe("permission log", () => {
    it("receives one line per decision", async () => {
      const onPermissionLog = vi.fn();
      const policy = new PermissionPolicy({ mode: "deny_all", onPermissionLog });

      await policy.handleRequestPermission(request("test_op"));

      expect(onPermissionLog).toHaveBeenCalledTimes(1);
      expect(onPermissionLog).toHaveBeenCalledWith("[PERMISSION] DENIED test_op: deny_all mode");
    });

    it("reports approvals", async () => {
      const onPermissionLog = vi.fn();
      const policy = new PermissionPolicy({ onPermissionLog });

      await policy.handleRequestPermission(request("test_op"));

      expect(onPermissionLog).toHaveBeenCalledWith("[PERMISSION] APPROVED test_op: auto_approve mode");
    });
  });
});
