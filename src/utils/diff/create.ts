import { DiffError } from "./errors.js";
import {
  END_SECTION_MARKERS,
  HUNK_ADD_LINE_PREFIX,
  isHunkMarker,
} from "./markers.js";
import { ParserState } from "./parser-state.js";

/**
 * Builds the lines of a new file from a diff made only of additions. Blank
 * lines and hunk markers are skipped; nothing is matched against existing
 * content.
 */
export function parseCreateDiff(lines: ReadonlyArray<string>): Array<string> {
  const state = new ParserState(lines);
  const output: Array<string> = [];
  while (!state.isDone(END_SECTION_MARKERS)) {
    const line = state.readStr("") ?? "";
    if (line.trim() === "" || isHunkMarker(line)) {
      continue;
    }
    if (!line.startsWith(HUNK_ADD_LINE_PREFIX)) {
      throw new DiffError(
        "format",
        `Create mode requires every content line to be an addition (line ${state.index}): ${line}`,
      );
    }
    output.push(line.slice(HUNK_ADD_LINE_PREFIX.length));
  }
  return output;
}
