/**
 * `format` means the diff text itself is malformed; `resolution` means it
 * is well formed but does not apply to the text it was given.
 */
export type DiffErrorKind = "format" | "resolution";

export class DiffError extends Error {
  readonly kind: DiffErrorKind;

  constructor(kind: DiffErrorKind, message: string) {
    super(message);
    this.name = "DiffError";
    this.kind = kind;
  }
}

export function isDiffError(
  err: unknown,
  kind?: DiffErrorKind,
): err is DiffError {
  return err instanceof DiffError && (kind == null || err.kind === kind);
}
