import { DiffError } from "./errors.js";

export interface Chunk {
  /** Line index in the original text where the edit starts. */
  origIndex: number;
  delLines: Array<string>;
  insLines: Array<string>;
}

/**
 * Splices `chunks` into `lines`. Chunks must be in bounds, in order and
 * non-overlapping.
 */
export function applyChunks(
  lines: ReadonlyArray<string>,
  chunks: ReadonlyArray<Chunk>,
): Array<string> {
  const dest: Array<string> = [];
  let cursor = 0;
  for (const chunk of chunks) {
    const end = chunk.origIndex + chunk.delLines.length;
    if (chunk.origIndex < 0 || end > lines.length) {
      throw new DiffError(
        "resolution",
        `Chunk at line ${chunk.origIndex} (removing ${chunk.delLines.length}) is outside the text (${lines.length} lines)`,
      );
    }
    if (cursor > chunk.origIndex) {
      throw new DiffError(
        "resolution",
        `Chunk at line ${chunk.origIndex} overlaps the previous chunk, which ends at line ${cursor}`,
      );
    }
    dest.push(...lines.slice(cursor, chunk.origIndex));
    dest.push(...chunk.insLines);
    cursor = end;
  }
  dest.push(...lines.slice(cursor));
  return dest;
}
