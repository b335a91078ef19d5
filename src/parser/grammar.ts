/**
 * PEG grammar for option values (integer literals and byte sizes).
 * Compiled by peggy at runtime.
 *
 * Every start rule always succeeds: it reports the literal found at the start
 * of the input (or null) and the unparsed remainder, so callers decide what
 * trailing text means.
 */
export const VALUE_GRAMMAR = `
SignedPrefix
  = _ negative:Sign magnitude:Magnitude rest:Rest
    {
      return {
        literal: { negative: negative, radix: magnitude.radix, digits: magnitude.digits },
        rest: rest
      };
    }
  / rest:Rest { return { literal: null, rest: rest }; }

UnsignedPrefix
  = _ magnitude:Magnitude rest:Rest
    {
      return {
        literal: { negative: false, radix: magnitude.radix, digits: magnitude.digits },
        rest: rest
      };
    }
  / rest:Rest { return { literal: null, rest: rest }; }

SizePrefix
  = _ negative:Sign number:SizeNumber unit:Unit? rest:Rest
    {
      return {
        literal: {
          negative: negative,
          whole: number.whole,
          fraction: number.fraction,
          unit: unit
        },
        rest: rest
      };
    }
  / rest:Rest { return { literal: null, rest: rest }; }

Sign
  = sign:[+-]? { return sign === "-"; }

Magnitude
  = "0" [xX] digits:$[0-9a-fA-F]+ { return { radix: 16, digits: digits }; }
  / digits:$("0" [0-7]*) { return { radix: 8, digits: digits }; }
  / digits:$([1-9] [0-9]*) { return { radix: 10, digits: digits }; }

SizeNumber
  = whole:$[0-9]+ fraction:("." @$[0-9]*)? { return { whole: whole, fraction: fraction || "" }; }
  / "." fraction:$[0-9]+ { return { whole: "", fraction: fraction }; }

Unit
  = unit:[BbKkMmGgTtPpEe] { return unit.toUpperCase(); }

Rest
  = $.*

_ "whitespace"
  = [ \\t\\n\\r\\f\\v]*
`;
