import peggy from 'peggy';
import { VALUE_GRAMMAR } from './grammar';
import type { IntegerPrefix, SizePrefix } from './types';

const START_RULES = ['SignedPrefix', 'UnsignedPrefix', 'SizePrefix'] as const;

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(VALUE_GRAMMAR, { allowedStartRules: [...START_RULES] });
  }
  return cachedParser;
}

/**
 * Split off a leading signed integer literal (`[+-]`, then decimal, `0`-octal
 * or `0x`-hex digits, after optional whitespace).
 */
export function parseSignedPrefix(input: string): IntegerPrefix {
  return getParser().parse(input, { startRule: 'SignedPrefix' }) as IntegerPrefix;
}

/** Like {@link parseSignedPrefix}, but no sign is recognized. */
export function parseUnsignedPrefix(input: string): IntegerPrefix {
  return getParser().parse(input, { startRule: 'UnsignedPrefix' }) as IntegerPrefix;
}

/** Split off a leading size literal such as `1.5G` or `512`. */
export function parseSizePrefix(input: string): SizePrefix {
  return getParser().parse(input, { startRule: 'SizePrefix' }) as SizePrefix;
}
