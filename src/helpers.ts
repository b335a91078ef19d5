import { parseSignedPrefix, parseSizePrefix, parseUnsignedPrefix } from './parser/ValueParser';
import type { IntegerLiteral, SizeUnit } from './parser/types';

export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;
export const UINT64_MAX = (1n << 64n) - 1n;

/**
 * Upper bound on the number of elements a single `lower-upper` occurrence
 * may expand to. Applies to signed and unsigned ranges alike.
 */
export const RANGE_MAX = 65536n;

const UNIT_SHIFTS: Record<SizeUnit, bigint> = {
  B: 0n,
  K: 10n,
  M: 20n,
  G: 30n,
  T: 40n,
  P: 50n,
  E: 60n,
};

/** A parsed leading integer and the text left after it. */
export interface IntegerPrefixValue {
  value: bigint;
  rest: string;
}

/** Convert a grammar integer literal to its exact value. */
export function literalToBigInt(literal: IntegerLiteral): bigint {
  let magnitude: bigint;
  switch (literal.radix) {
    case 16:
      magnitude = BigInt(`0x${literal.digits}`);
      break;
    case 8:
      magnitude = BigInt(`0o${literal.digits}`);
      break;
    default:
      magnitude = BigInt(literal.digits);
  }
  return literal.negative ? -magnitude : magnitude;
}

/**
 * Parse the leading signed integer of `text`.
 * Returns null if there is none or it lies outside the int64 domain.
 */
export function parseInt64Prefix(text: string): IntegerPrefixValue | null {
  const { literal, rest } = parseSignedPrefix(text);
  if (!literal) return null;
  const value = literalToBigInt(literal);
  if (value < INT64_MIN || value > INT64_MAX) return null;
  return { value, rest };
}

/**
 * Parse the leading unsigned integer of `text`.
 * Returns null if there is none or it exceeds the uint64 domain.
 */
export function parseUint64Prefix(text: string): IntegerPrefixValue | null {
  const { literal, rest } = parseUnsignedPrefix(text);
  if (!literal) return null;
  const value = literalToBigInt(literal);
  if (value > UINT64_MAX) return null;
  return { value, rest };
}

/** Parse `text` as exactly one int64 literal, or return null. */
export function parseInt64(text: string): bigint | null {
  const parsed = parseInt64Prefix(text);
  return parsed && parsed.rest === '' ? parsed.value : null;
}

/** Parse `text` as exactly one uint64 literal, or return null. */
export function parseUint64(text: string): bigint | null {
  const parsed = parseUint64Prefix(text);
  return parsed && parsed.rest === '' ? parsed.value : null;
}

/**
 * Whether `lower-upper` is an acceptable interval: ordered, and expanding to
 * at most {@link RANGE_MAX} elements.
 */
export function isAcceptableRange(lower: bigint, upper: bigint): boolean {
  return lower <= upper && upper - lower < RANGE_MAX;
}

/**
 * Parse a human-scale byte size such as `512`, `4k` or `1.5G`.
 *
 * Units are binary multipliers (`K` = 1024). Without a unit the value is in
 * bytes, in which case it must be integral. The result must be a
 * non-negative integer no greater than {@link INT64_MAX}; fractional results
 * are truncated.
 */
export function parseSize(text: string): bigint | null {
  const { literal, rest } = parseSizePrefix(text);
  if (!literal || rest !== '') return null;

  const shift = UNIT_SHIFTS[literal.unit ?? 'B'];
  const hasFraction = /[1-9]/.test(literal.fraction);
  if (hasFraction && shift === 0n) return null;

  const scale = 10n ** BigInt(literal.fraction.length);
  const mantissa = BigInt(literal.whole || '0') * scale + BigInt(literal.fraction || '0');
  if (literal.negative && mantissa !== 0n) return null;

  const value = (mantissa << shift) / scale;
  if (value > INT64_MAX) return null;
  return value;
}
