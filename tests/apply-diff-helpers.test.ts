import { applyChunks } from "../src/utils/diff/chunks.js";
import { DiffError, isDiffError } from "../src/utils/diff/errors.js";
import {
  findContext,
  findContextCore,
  NO_MATCH_FUZZ,
  NOT_FOUND,
} from "../src/utils/diff/find-context.js";
import { joinLines, normalizeLines } from "../src/utils/diff/lines.js";
import { ParserState } from "../src/utils/diff/parser-state.js";
import { parseDirective, readSection } from "../src/utils/diff/section.js";
import { parseUpdateDiff } from "../src/utils/diff/update.js";
import { describe, expect, test } from "vitest";

function catchDiffError(fn: () => unknown): DiffError {
  try {
    fn();
  } catch (err) {
    if (isDiffError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected the call to throw");
}

describe("normalizeLines / joinLines", () => {
  test("drops a single trailing newline", () => {
    expect(normalizeLines("a\nb\n")).toEqual(["a", "b"]);
    expect(normalizeLines("a\n\n")).toEqual(["a", ""]);
    expect(normalizeLines("")).toEqual([]);
  });

  test("re-normalizing joined lines gives the same lines", () => {
    for (const text of ["", "\n", "a", "a\n", "a\nb", "a\n\nb\n"]) {
      const lines = normalizeLines(text);
      expect(normalizeLines(joinLines(lines))).toEqual(lines);
    }
  });

  test("joined text always ends with exactly one newline", () => {
    expect(joinLines(["a", "b"])).toBe("a\nb\n");
    expect(joinLines(["a", "b", ""])).toBe("a\nb\n");
    expect(joinLines([])).toBe("");
  });
});

describe("ParserState", () => {
  test("is done when the index is out of range", () => {
    expect(new ParserState(["line"], 1).isDone()).toBe(true);
  });

  test("is done on a line starting with a terminator", () => {
    const state = new ParserState(["*** End Patch"]);
    expect(state.isDone(["*** End Patch"])).toBe(true);
    expect(state.isDone(["@@"])).toBe(false);
  });

  test("readStr leaves the cursor alone when the prefix is missing", () => {
    const state = new ParserState(["value"]);
    expect(state.readStr("nomatch")).toBeUndefined();
    expect(state.index).toBe(0);
    expect(state.readStr("va")).toBe("lue");
    expect(state.index).toBe(1);
  });
});

describe("readSection", () => {
  test("returns the eof flag", () => {
    expect(readSection(["*** End of File"], 0)).toEqual({
      context: [],
      chunks: [],
      endIndex: 1,
      eof: true,
    });
  });

  test("rejects an unknown *** marker", () => {
    const err = catchDiffError(() => readSection(["*** Bad Marker"], 0));
    expect(err.kind).toBe("format");
    expect(err.message).toBe("Invalid Line: *** Bad Marker");
  });

  test("rejects an empty section", () => {
    const err = catchDiffError(() => readSection([], 0));
    expect(err.kind).toBe("format");
    expect(err.message).toBe(
      "A section must contain at least one directive line",
    );
    expect(catchDiffError(() => readSection(["@@"], 0)).message).toBe(
      "A section must contain at least one directive line, found: @@",
    );
  });

  test("rejects a line without a directive prefix", () => {
    expect(catchDiffError(() => readSection(["?x"], 0)).message).toBe(
      "Invalid Line: ?x",
    );
  });

  test("splits change runs separated by context", () => {
    const lines = [" a", "-b", "+B", " c", "-d", "+D", " e", "@@ next"];
    expect(readSection(lines, 0)).toEqual({
      context: ["a", "b", "c", "d", "e"],
      chunks: [
        { origIndex: 1, delLines: ["b"], insLines: ["B"] },
        { origIndex: 3, delLines: ["d"], insLines: ["D"] },
      ],
      endIndex: 7,
      eof: false,
    });
  });

  test("reads an empty line as blank context", () => {
    expect(readSection([" a", "", "-b"], 0).context).toEqual(["a", "", "b"]);
  });
});

describe("parseDirective", () => {
  test("classifies by first character", () => {
    expect(parseDirective("+x")).toEqual({ kind: "insertion", text: "x" });
    expect(parseDirective("-x")).toEqual({ kind: "deletion", text: "x" });
    expect(parseDirective(" x")).toEqual({ kind: "context", text: "x" });
  });
});

describe("findContext", () => {
  test("reports the sentinel when nothing matches, even with eof", () => {
    expect(findContext(["one"], ["missing"], 0, true)).toEqual({
      index: NOT_FOUND,
      fuzz: NO_MATCH_FUZZ,
    });
  });

  test("surrounding whitespace costs 100", () => {
    expect(findContextCore([" line "], ["line"], 0)).toEqual({
      index: 0,
      fuzz: 100,
    });
  });

  test("trailing whitespace alone costs 1", () => {
    expect(findContextCore(["line  "], ["line"], 0)).toEqual({
      index: 0,
      fuzz: 1,
    });
  });

  test("the end-of-file fallback is what finds context behind the cursor", () => {
    const lines = ["a", "b", "c"];
    expect(findContext(lines, ["b", "c"], 2, true)).toEqual({
      index: 1,
      fuzz: 0,
    });
    expect(findContext(lines, ["b", "c"], 2, false)).toEqual({
      index: NOT_FOUND,
      fuzz: NO_MATCH_FUZZ,
    });
  });

  test("empty context matches at the cursor, or at the end with eof", () => {
    expect(findContext(["a", "b", "c"], [], 1, false)).toEqual({
      index: 1,
      fuzz: 0,
    });
    expect(findContext(["a", "b", "c"], [], 1, true)).toEqual({
      index: 3,
      fuzz: 0,
    });
  });
});

describe("applyChunks", () => {
  test("rejects out-of-range and overlapping chunks", () => {
    const outOfRange = catchDiffError(() =>
      applyChunks(["abc"], [{ origIndex: 10, delLines: [], insLines: [] }]),
    );
    expect(outOfRange.kind).toBe("resolution");

    const overlapping = catchDiffError(() =>
      applyChunks(
        ["a", "b"],
        [
          { origIndex: 0, delLines: ["a"], insLines: [] },
          { origIndex: 0, delLines: ["b"], insLines: [] },
        ],
      ),
    );
    expect(overlapping.kind).toBe("resolution");
    expect(overlapping.message).toBe(
      "Chunk at line 0 overlaps the previous chunk, which ends at line 1",
    );
  });

  test("rejects a deletion running past the end", () => {
    const err = catchDiffError(() =>
      applyChunks(["a"], [{ origIndex: 0, delLines: ["a", "b"], insLines: [] }]),
    );
    expect(err.message).toBe(
      "Chunk at line 0 (removing 2) is outside the text (1 lines)",
    );
  });

  test("splices insertions in place of deletions", () => {
    expect(
      applyChunks(
        ["a", "b", "c"],
        [
          { origIndex: 0, delLines: ["a"], insLines: ["A"] },
          { origIndex: 2, delLines: ["c"], insLines: [] },
        ],
      ),
    ).toEqual(["A", "b"]);
  });
});

describe("parseUpdateDiff", () => {
  test("resolves chunks in increasing order and sums their fuzz", () => {
    const result = parseUpdateDiff(
      [" a ", "-b", "@@", "-d"],
      ["a", "b", "c", "d"],
    );
    expect(result).toEqual({
      chunks: [
        { origIndex: 1, delLines: ["b"], insLines: [] },
        { origIndex: 3, delLines: ["d"], insLines: [] },
      ],
      fuzz: 1,
    });
  });
});
