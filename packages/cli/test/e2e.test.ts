/**
 * End-to-end CLI tests
 * Runs the entry point in a child process through the tsx loader
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseJsonOutput, runCli } from "@recipefind/testkit/cli";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const CLI_PATH = path.join(__dirname, "../src/cli.ts");
const REPO_ROOT = path.resolve(__dirname, "../../..");
const FIXTURE = path.join(__dirname, "fixtures/recipes.json");

function recipefind(args: string[], env: Record<string, string> = {}) {
  return runCli(CLI_PATH, args, {
    cwd: REPO_ROOT,
    loader: "tsx",
    conditions: ["source"],
    env: { RECIPEFIND_METADATA: FIXTURE, BB_RECIPE_SCOPE: "", ...env },
  });
}

describe("recipefind e2e", () => {
  it("should print matches and exit 0", async () => {
    const result = await recipefind(["busybox"]);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("busybox\nbusybox-native");
  });

  it("should print JSON outcomes", async () => {
    const result = await recipefind(["--json", "--exact", "zlib"]);
    expect(result.exitCode).toBe(0);
    expect(parseJsonOutput(result.stdout)).toEqual([
      {
        fn: "/layers/core/recipes-core/zlib/zlib_1.3.1.bb",
        name: "zlib",
        nameMatched: true,
        provides: [],
        runtime: [],
      },
    ]);
  });

  it("should exit 2 on word boundaries without --regex or --wildcard", async () => {
    const result = await recipefind(["--word", "busybox"]);
    expect(result.exitCode).toBe(2);
    expect(result.stdout).toBe("");
    expect(result.stderr).toBe("Error: --word can only be used with --regex or --wildcard");
  });

  it("should exit 1 on a malformed pattern", async () => {
    const result = await recipefind(["--regex", "["]);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe("");
  });

  it("should honour BB_RECIPE_SCOPE from the environment", async () => {
    const result = await recipefind(["zlib"], { BB_RECIPE_SCOPE: "core-image-minimal" });
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("");
  });
});
