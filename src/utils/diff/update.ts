import type { Chunk } from "./chunks.js";
import type { ContextMatch } from "./find-context.js";
import type { Section } from "./section.js";

import { DiffError } from "./errors.js";
import { findContext, findContextCore, NOT_FOUND } from "./find-context.js";
import { END_SECTION_MARKERS, HUNK_MARKER } from "./markers.js";
import { ParserState } from "./parser-state.js";
import { readSection } from "./section.js";

export interface ParsedUpdateDiff {
  chunks: Array<Chunk>;
  /** Sum of the fuzz of every match the diff needed. */
  fuzz: number;
}

/**
 * The hint after `@@` is tried first as the line right above the section.
 * Failing that it is sought on its own and the section is located below it.
 */
function locateSection(
  lines: ReadonlyArray<string>,
  section: Section,
  hint: string,
  cursor: number,
): ContextMatch {
  if (hint.trim() === "") {
    return findContext(lines, section.context, cursor, section.eof);
  }

  const hinted = findContext(
    lines,
    [hint, ...section.context],
    cursor,
    section.eof,
  );
  if (hinted.index !== NOT_FOUND) {
    return { index: hinted.index + 1, fuzz: hinted.fuzz };
  }

  const anchor = findContextCore(lines, [hint], cursor);
  if (anchor.index === NOT_FOUND) {
    return findContext(lines, section.context, cursor, section.eof);
  }
  const match = findContext(
    lines,
    section.context,
    anchor.index + 1,
    section.eof,
  );
  if (match.index === NOT_FOUND) {
    return match;
  }
  return { index: match.index, fuzz: match.fuzz + anchor.fuzz };
}

/**
 * Resolves every section of `diffLines` against `inputLines`. Sections are
 * matched in order: each search starts where the previous section's last
 * deletion ended.
 */
export function parseUpdateDiff(
  diffLines: ReadonlyArray<string>,
  inputLines: ReadonlyArray<string>,
): ParsedUpdateDiff {
  const state = new ParserState(diffLines);
  const chunks: Array<Chunk> = [];
  let cursor = 0;
  let fuzz = 0;
  let hunk = 0;

  while (!state.isDone(END_SECTION_MARKERS)) {
    hunk += 1;
    const header = state.readStr(HUNK_MARKER);
    if (header === undefined && hunk > 1) {
      throw new DiffError("format", `Invalid Line:\n${state.current()}`);
    }
    const hint = header?.startsWith(" ") ? header.slice(1) : (header ?? "");

    const section = readSection(state.lines, state.index);
    const match = locateSection(inputLines, section, hint, cursor);
    if (match.index === NOT_FOUND) {
      const expected = hint.trim()
        ? [hint, ...section.context]
        : section.context;
      throw new DiffError(
        "resolution",
        `Hunk ${hunk}: invalid ${section.eof ? "EOF context" : "context"} at line ${cursor}:\n${expected.join("\n")}`,
      );
    }

    fuzz += match.fuzz;
    for (const chunk of section.chunks) {
      chunks.push({ ...chunk, origIndex: chunk.origIndex + match.index });
    }
    const last = section.chunks[section.chunks.length - 1];
    cursor = last
      ? match.index + last.origIndex + last.delLines.length
      : match.index + section.context.length;
    state.index = section.endIndex;
  }

  return { chunks, fuzz };
}
