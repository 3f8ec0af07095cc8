import type { Chunk } from "./utils/diff/chunks.js";

import { applyChunks } from "./utils/diff/chunks.js";
import { parseCreateDiff } from "./utils/diff/create.js";
import { DiffError } from "./utils/diff/errors.js";
import { joinLines, normalizeLines } from "./utils/diff/lines.js";
import { parseUpdateDiff } from "./utils/diff/update.js";

export type { Chunk } from "./utils/diff/chunks.js";
export type { DiffErrorKind } from "./utils/diff/errors.js";
export { DiffError, isDiffError } from "./utils/diff/errors.js";

/**
 * `update` matches the diff's context against the input; `create` builds a
 * new text from additions only and never reads the input.
 */
export type ApplyDiffMode = "update" | "create";

export type ApplyDiffOptions = {
  /** Reject updates whose matches needed more total fuzz than this. */
  maxFuzz?: number;
};

export type AppliedDiff = {
  text: string;
  fuzz: number;
  chunks: Array<Chunk>;
};

export function applyDiffDetailed(
  input: string,
  diff: string,
  mode: ApplyDiffMode = "update",
  options: ApplyDiffOptions = {},
): AppliedDiff {
  if (options.maxFuzz != null && !Number.isFinite(options.maxFuzz)) {
    throw new RangeError(
      `maxFuzz must be a finite number, got ${options.maxFuzz}`,
    );
  }
  const diffLines = normalizeLines(diff);
  if (mode === "create") {
    return { text: joinLines(parseCreateDiff(diffLines)), fuzz: 0, chunks: [] };
  }

  const inputLines = normalizeLines(input);
  const { chunks, fuzz } = parseUpdateDiff(diffLines, inputLines);
  if (options.maxFuzz != null && fuzz > options.maxFuzz) {
    throw new DiffError(
      "resolution",
      `Patch needed fuzz ${fuzz} to match, above the limit of ${options.maxFuzz}`,
    );
  }
  return { text: joinLines(applyChunks(inputLines, chunks)), fuzz, chunks };
}

/**
 * Applies a context-anchored diff to `input` and returns the new text, which
 * always ends with a newline. Throws a {@link DiffError} instead of
 * returning a partial result.
 */
export function applyDiff(
  input: string,
  diff: string,
  mode: ApplyDiffMode = "update",
  options: ApplyDiffOptions = {},
): string {
  return applyDiffDetailed(input, diff, mode, options).text;
}
