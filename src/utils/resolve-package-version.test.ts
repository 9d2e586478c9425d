import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolvePackageVersion } from "./resolve-package-version.js";

describe("resolvePackageVersion", () => {
  let root: string;
  /** Stands in for the `import.meta.url` of a module at <root>/lib/mod.js. */
  let moduleUrl: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "loopwright-version-test-"));
    mkdirSync(join(root, "lib"));
    moduleUrl = pathToFileURL(join(root, "lib", "mod.js")).href;
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function writePackage(dir: string, contents: unknown): void {
    writeFileSync(join(root, dir, "package.json"), JSON.stringify(contents));
  }

  it("reads the version relative to the calling module", () => {
    writePackage(".", { name: "pkg", version: "1.2.3" });

    expect(resolvePackageVersion(moduleUrl, ["../package.json"])).toBe("1.2.3");
  });

  it("falls through missing candidates", () => {
    writePackage(".", { version: "2.0.0" });

    expect(resolvePackageVersion(moduleUrl, ["./package.json", "../package.json"])).toBe("2.0.0");
  });

  it("skips a package.json without a usable version", () => {
    writePackage("lib", { name: "no-version" });
    writePackage(".", { version: "3.0.0" });

    expect(resolvePackageVersion(moduleUrl, ["./package.json", "../package.json"])).toBe("3.0.0");
  });

  it("skips empty and non-string versions", () => {
    writePackage("lib", { version: "" });
    writePackage(".", { version: 4 });

    expect(resolvePackageVersion(moduleUrl, ["./package.json", "../package.json"])).toBe("unknown");
  });

  it("skips files that are not JSON", () => {
    writeFileSync(join(root, "package.json"), "not json");

    expect(resolvePackageVersion(moduleUrl, ["../package.json"])).toBe("unknown");
  });

  it("returns unknown for an empty candidate list", () => {
    expect(resolvePackageVersion(moduleUrl, [])).toBe("unknown");
  });
});
