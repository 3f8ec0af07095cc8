/**
 * Splits text into lines. A single trailing newline is not kept as an
 * empty last line: output always ends with one (see {@link joinLines}).
 */
export function normalizeLines(text: string): Array<string> {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function joinLines(lines: ReadonlyArray<string>): string {
  if (lines.length === 0) {
    return "";
  }
  const text = lines.join("\n");
  return text.endsWith("\n") ? text : text + "\n";
}
