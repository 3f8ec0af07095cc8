import type { AppConfig } from "../src/utils/config.js";
import type { PatchCommandOptions } from "../src/utils/patch-command.js";

import { runPatchCommand } from "../src/utils/patch-command.js";
import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

const plainConfig: AppConfig = { previewContext: 3, color: false };

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "patch-command-"));
  fs.writeFileSync(path.join(root, "a.txt"), "one\ntwo\n");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function options(overrides: Partial<PatchCommandOptions>): PatchCommandOptions {
  return {
    file: "a.txt",
    patch: "@@\n one\n-two\n+2",
    mode: "update",
    cwd: root,
    dryRun: false,
    preview: false,
    config: plainConfig,
    ...overrides,
  };
}

function readFile(): string {
  return fs.readFileSync(path.join(root, "a.txt"), "utf8");
}

describe("runPatchCommand", () => {
  test("dry run prints the patched text and leaves the file alone", async () => {
    const written: Array<string> = [];

    const result = await runPatchCommand(options({ dryRun: true }), (text) =>
      written.push(text),
    );

    expect(result.status).toBe("completed");
    expect(written).toEqual(["one\n2\n"]);
    expect(readFile()).toBe("one\ntwo\n");
  });

  test("preview prints a plain diff when color is off", async () => {
    const written: Array<string> = [];

    const result = await runPatchCommand(options({ preview: true }), (text) =>
      written.push(text),
    );

    expect(result.output).toBe("Updated a.txt");
    expect(written).toHaveLength(2);
    const lines = (written[0] ?? "").split("\n");
    expect(lines).toContain("-two");
    expect(lines).toContain("+2");
    expect(written[1]).toBe("a.txt: +1 -1");
    expect(readFile()).toBe("one\n2\n");
  });

  test("deletes the file", async () => {
    const result = await runPatchCommand(
      options({ mode: "delete", patch: "" }),
      () => {},
    );

    expect(result.output).toBe("Deleted a.txt");
    expect(fs.existsSync(path.join(root, "a.txt"))).toBe(false);
  });

  test("fails when the match needs more fuzz than allowed", async () => {
    fs.writeFileSync(path.join(root, "a.txt"), "  one\ntwo\n");

    const result = await runPatchCommand(
      options({ config: { ...plainConfig, maxFuzz: 0 } }),
      () => {},
    );

    expect(result).toEqual({
      type: "apply_patch_call_output",
      call_id: "cli",
      status: "failed",
      output:
        "Patch rejected (resolution error): Patch needed fuzz 100 to match, above the limit of 0",
    });
    expect(readFile()).toBe("  one\ntwo\n");
  });
});
