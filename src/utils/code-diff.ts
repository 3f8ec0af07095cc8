import { DEFAULT_PREVIEW_CONTEXT } from "./config.js";
import chalk from "chalk";
import { createTwoFilesPatch } from "diff";

/**
 * Unified diff of two versions of a file, for previews.
 */
export function generateFileDiff(
  originalContent: string,
  updatedContent: string,
  filePath: string,
  context: number = DEFAULT_PREVIEW_CONTEXT,
): string {
  return createTwoFilesPatch(
    `${filePath} (original)`,
    `${filePath} (modified)`,
    originalContent,
    updatedContent,
    undefined,
    undefined,
    { context },
  );
}

export function generateColoredDiff(diffContent: string): string {
  return diffContent
    .split(/\r?\n/)
    .map((line) => {
      if (line.startsWith("+++") || line.startsWith("---")) {
        // file headers stay uncolored
        return line;
      } else if (line.startsWith("+")) {
        return chalk.green(line);
      } else if (line.startsWith("-")) {
        return chalk.red(line);
      } else if (line.startsWith("@@")) {
        return chalk.cyan(line);
      }
      return line;
    })
    .join("\n");
}

/** Returns `[added, removed]` line counts of a unified diff. */
export function generateDiffStats(diffContent: string): [number, number] {
  let linesAdded = 0;
  let linesRemoved = 0;

  for (const line of diffContent.split(/\r?\n/)) {
    if (line.startsWith("+") && !line.startsWith("+++")) {
      linesAdded += 1;
    } else if (line.startsWith("-") && !line.startsWith("---")) {
      linesRemoved += 1;
    }
  }

  return [linesAdded, linesRemoved];
}
