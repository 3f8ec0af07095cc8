/** Cursor over the lines of a diff. */
export class ParserState {
  readonly lines: ReadonlyArray<string>;
  index: number;

  constructor(lines: ReadonlyArray<string>, index = 0) {
    this.lines = lines;
    this.index = index;
  }

  current(): string | undefined {
    return this.lines[this.index];
  }

  isDone(terminators: ReadonlyArray<string> = []): boolean {
    const line = this.current();
    if (line === undefined) {
      return true;
    }
    return terminators.some((t) => line.startsWith(t));
  }

  /**
   * Consumes the current line when it starts with `prefix` and returns the
   * rest of it. Returns `undefined`, without moving, otherwise.
   */
  readStr(prefix: string): string | undefined {
    const line = this.current();
    if (line === undefined || !line.startsWith(prefix)) {
      return undefined;
    }
    this.index += 1;
    return line.slice(prefix.length);
  }
}
