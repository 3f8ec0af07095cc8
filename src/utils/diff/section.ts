import type { Chunk } from "./chunks.js";

import { DiffError } from "./errors.js";
import {
  END_OF_FILE_MARKER,
  END_SECTION_MARKERS,
  HUNK_ADD_LINE_PREFIX,
  HUNK_CONTEXT_LINE_PREFIX,
  HUNK_DELETE_LINE_PREFIX,
  isHunkMarker,
} from "./markers.js";

export type Directive =
  | { kind: "context"; text: string }
  | { kind: "deletion"; text: string }
  | { kind: "insertion"; text: string };

export interface Section {
  /** Lines the original must contain: context and deletions, in order. */
  context: Array<string>;
  /** Edits, with `origIndex` relative to the start of `context`. */
  chunks: Array<Chunk>;
  /** Index of the first diff line after the section. */
  endIndex: number;
  eof: boolean;
}

export function parseDirective(line: string): Directive {
  // Editors strip trailing whitespace, which turns a blank context line
  // into an empty one.
  if (line === "") {
    return { kind: "context", text: "" };
  }
  const text = line.slice(1);
  switch (line[0]) {
    case HUNK_CONTEXT_LINE_PREFIX:
      return { kind: "context", text };
    case HUNK_DELETE_LINE_PREFIX:
      return { kind: "deletion", text };
    case HUNK_ADD_LINE_PREFIX:
      return { kind: "insertion", text };
    default:
      throw new DiffError("format", `Invalid Line: ${line}`);
  }
}

function isSectionBoundary(line: string): boolean {
  return (
    isHunkMarker(line) || END_SECTION_MARKERS.some((m) => line.startsWith(m))
  );
}

export function readSection(
  lines: ReadonlyArray<string>,
  startIndex: number,
): Section {
  const context: Array<string> = [];
  const chunks: Array<Chunk> = [];
  let delLines: Array<string> = [];
  let insLines: Array<string> = [];

  const flush = () => {
    if (delLines.length || insLines.length) {
      chunks.push({
        origIndex: context.length - delLines.length,
        delLines,
        insLines,
      });
    }
    delLines = [];
    insLines = [];
  };

  let index = startIndex;
  for (; index < lines.length; index++) {
    const line = lines[index] ?? "";
    if (isSectionBoundary(line)) {
      break;
    }
    if (line.startsWith("***")) {
      throw new DiffError("format", `Invalid Line: ${line}`);
    }
    const directive = parseDirective(line);
    switch (directive.kind) {
      case "context":
        flush();
        context.push(directive.text);
        break;
      case "deletion":
        delLines.push(directive.text);
        context.push(directive.text);
        break;
      case "insertion":
        insLines.push(directive.text);
        break;
      default: {
        const exhaustive: never = directive;
        throw new DiffError(
          "format",
          `Unknown directive: ${JSON.stringify(exhaustive)}`,
        );
      }
    }
  }
  flush();

  if (lines[index] === END_OF_FILE_MARKER) {
    return { context, chunks, endIndex: index + 1, eof: true };
  }
  if (index === startIndex) {
    const next = lines[index];
    throw new DiffError(
      "format",
      next === undefined
        ? "A section must contain at least one directive line"
        : `A section must contain at least one directive line, found: ${next}`,
    );
  }
  return { context, chunks, endIndex: index, eof: false };
}
