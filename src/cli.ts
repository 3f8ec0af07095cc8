#!/usr/bin/env node
import "dotenv/config";

import type { PatchCommandMode } from "./utils/patch-command.js";

import { loadConfig } from "./utils/config.js";
import { flushLog, initLogger, log } from "./utils/logger/log.js";
import { runPatchCommand } from "./utils/patch-command.js";
import chalk from "chalk";
import fs from "fs";
import meow from "meow";

// Call this early so `tail -F ~/.local/anchor-patch/anchor-patch-latest.log`
// works immediately. This must be run with DEBUG=1 for logging to work.
initLogger();

const cli = meow(
  `
  Usage
    $ anchor-patch [options] <file> [patch-file]

  The patch is read from [patch-file], or from stdin when it is omitted.

  Options
    -h, --help            Show usage and exit
    --version             Print version and exit

    --create              Create <file> from a patch made only of additions
    --delete              Delete <file>
    --dry-run             Do not write anything; print the patched text
    --preview             Print a unified diff of the change
    --max-fuzz <n>        Reject patches whose context needed more fuzz than <n>
    --cwd <dir>           Workspace root that <file> must be inside (default: .)

  Examples
    $ anchor-patch src/index.ts fix.patch
    $ cat notes.patch | anchor-patch --create --preview notes.md
`,
  {
    importMeta: import.meta,
    autoHelp: true,
    flags: {
      help: { type: "boolean", shortFlag: "h" },
      version: { type: "boolean" },
      create: { type: "boolean", default: false },
      delete: { type: "boolean", default: false },
      dryRun: { type: "boolean", default: false },
      preview: { type: "boolean", default: false },
      maxFuzz: { type: "number" },
      cwd: { type: "string" },
    },
  },
);

async function readStdin(): Promise<string> {
  let text = "";
  process.stdin.setEncoding("utf8");
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

async function main(): Promise<number> {
  const [file, patchFile] = cli.input;
  if (!file) {
    return cli.showHelp(1);
  }
  if (cli.flags.create && cli.flags.delete) {
    // eslint-disable-next-line no-console
    console.error(chalk.red("--create and --delete cannot be combined"));
    return 1;
  }

  const { maxFuzz } = cli.flags;
  if (maxFuzz !== undefined && !Number.isFinite(maxFuzz)) {
    // eslint-disable-next-line no-console
    console.error(chalk.red("--max-fuzz must be a number"));
    return 1;
  }

  const mode: PatchCommandMode = cli.flags.create
    ? "create"
    : cli.flags.delete
      ? "delete"
      : "update";

  let patch = "";
  if (mode !== "delete") {
    patch = patchFile
      ? fs.readFileSync(patchFile, "utf8")
      : await readStdin();
    if (!patch) {
      // eslint-disable-next-line no-console
      console.error(chalk.red("Please pass patch text through stdin"));
      return 1;
    }
  }

  const config = loadConfig();
  log(`[anchor-patch] ${mode} ${file} with config ${JSON.stringify(config)}`);
  const result = await runPatchCommand(
    {
      file,
      patch,
      mode,
      cwd: cli.flags.cwd ?? process.cwd(),
      dryRun: cli.flags.dryRun,
      preview: cli.flags.preview,
      config: {
        ...config,
        maxFuzz: maxFuzz ?? config.maxFuzz,
      },
    },
    (text) => process.stdout.write(text.endsWith("\n") ? text : text + "\n"),
  );

  if (result.status === "failed") {
    // eslint-disable-next-line no-console
    console.error(chalk.red(result.output));
    return 1;
  }
  // eslint-disable-next-line no-console
  console.error(chalk.green(result.output));
  return 0;
}

async function exitWith(code: number): Promise<never> {
  await flushLog();
  process.exit(code);
}

main().then(exitWith, (err: unknown) => {
  log(`[anchor-patch] unexpected error: ${String(err)}`);
  // eslint-disable-next-line no-console
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  return exitWith(1);
});
