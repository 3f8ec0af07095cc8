export const NOT_FOUND = -1;

/** Fuzz reported when no tier matched. Anything at or above it is fatal. */
export const NO_MATCH_FUZZ = 10000;

export interface ContextMatch {
  index: number;
  fuzz: number;
}

// Models almost always emit the ASCII variant of characters that files on
// disk may contain as typographic look-alikes. Escapes keep this file ASCII.
const PUNCT_EQUIV: Record<string, string> = {
  /* U+2010 HYPHEN */ "\u2010": "-",
  /* U+2011 NO-BREAK HYPHEN */ "\u2011": "-",
  /* U+2012 FIGURE DASH */ "\u2012": "-",
  /* U+2013 EN DASH */ "\u2013": "-",
  /* U+2014 EM DASH */ "\u2014": "-",
  /* U+2212 MINUS SIGN */ "\u2212": "-",
  /* U+201C LEFT DOUBLE QUOTATION MARK */ "\u201C": '"',
  /* U+201D RIGHT DOUBLE QUOTATION MARK */ "\u201D": '"',
  /* U+201E DOUBLE LOW-9 QUOTATION MARK */ "\u201E": '"',
  /* U+00AB LEFT-POINTING DOUBLE ANGLE QUOTATION MARK */ "\u00AB": '"',
  /* U+00BB RIGHT-POINTING DOUBLE ANGLE QUOTATION MARK */ "\u00BB": '"',
  /* U+2018 LEFT SINGLE QUOTATION MARK */ "\u2018": "'",
  /* U+2019 RIGHT SINGLE QUOTATION MARK */ "\u2019": "'",
  /* U+201B SINGLE HIGH-REVERSED-9 QUOTATION MARK */ "\u201B": "'",
  /* U+00A0 NO-BREAK SPACE */ "\u00A0": " ",
  /* U+202F NARROW NO-BREAK SPACE */ "\u202F": " ",
};

export function canonicalizeLine(s: string): string {
  return s
    .normalize("NFC")
    .replace(/./gu, (c) => PUNCT_EQUIV[c] ?? c)
    .trim()
    .replace(/\s+/g, " ");
}

interface MatchTier {
  fuzz: number;
  canon: (s: string) => string;
}

const MATCH_TIERS: ReadonlyArray<MatchTier> = [
  { fuzz: 0, canon: (s) => s },
  { fuzz: 1, canon: (s) => s.trimEnd() },
  { fuzz: 100, canon: (s) => s.trim() },
  { fuzz: 1000, canon: canonicalizeLine },
];

function matchesAt(
  lines: ReadonlyArray<string>,
  context: ReadonlyArray<string>,
  start: number,
  canon: (s: string) => string,
): boolean {
  for (let j = 0; j < context.length; j++) {
    const line = lines[start + j];
    const expected = context[j];
    if (line === undefined || expected === undefined) {
      return false;
    }
    if (canon(line) !== canon(expected)) {
      return false;
    }
  }
  return true;
}

const notFound = (): ContextMatch => ({
  index: NOT_FOUND,
  fuzz: NO_MATCH_FUZZ,
});

/**
 * Scans forward from `start`. Tiers are tried in order and the first one
 * that matches anywhere wins, at its first position.
 */
export function findContextCore(
  lines: ReadonlyArray<string>,
  context: ReadonlyArray<string>,
  start: number,
): ContextMatch {
  if (context.length === 0) {
    return { index: start, fuzz: 0 };
  }
  const last = lines.length - context.length;
  for (const tier of MATCH_TIERS) {
    for (let i = start; i <= last; i++) {
      if (matchesAt(lines, context, i, tier.canon)) {
        return { index: i, fuzz: tier.fuzz };
      }
    }
  }
  return notFound();
}

function findContextAtTail(
  lines: ReadonlyArray<string>,
  context: ReadonlyArray<string>,
): ContextMatch {
  const tail = lines.length - context.length;
  if (tail < 0) {
    return notFound();
  }
  for (const tier of MATCH_TIERS) {
    if (matchesAt(lines, context, tail, tier.canon)) {
      return { index: tail, fuzz: tier.fuzz };
    }
  }
  return notFound();
}

/**
 * Locates `context` in `lines` at or after `start`. With `eof`, a failed
 * forward search is retried against the last `context.length` lines of the
 * text, wherever `start` is.
 */
export function findContext(
  lines: ReadonlyArray<string>,
  context: ReadonlyArray<string>,
  start: number,
  eof: boolean,
): ContextMatch {
  if (eof && context.length === 0) {
    return { index: lines.length, fuzz: 0 };
  }
  const match = findContextCore(lines, context, start);
  if (match.index !== NOT_FOUND || !eof) {
    return match;
  }
  return findContextAtTail(lines, context);
}
