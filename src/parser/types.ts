/**
 * Values produced by the option value grammar.
 */

/** An integer literal as written: sign, radix and digit text. */
export interface IntegerLiteral {
  negative: boolean;
  radix: 8 | 10 | 16;
  /** Digits without the `0x` prefix. Octal digits keep their leading `0`. */
  digits: string;
}

/** Leading integer literal of a string and the text left after it. */
export interface IntegerPrefix {
  /** Null when the string does not start with an integer literal. */
  literal: IntegerLiteral | null;
  rest: string;
}

export type SizeUnit = 'B' | 'K' | 'M' | 'G' | 'T' | 'P' | 'E';

/** A size literal: decimal number with optional fraction and unit suffix. */
export interface SizeLiteral {
  negative: boolean;
  whole: string;
  fraction: string;
  /** Upper-cased suffix, or null when absent. */
  unit: SizeUnit | null;
}

export interface SizePrefix {
  literal: SizeLiteral | null;
  rest: string;
}
