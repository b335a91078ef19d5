import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

export type IntegerSignedness = 'signed' | 'unsigned';

/**
 * 64-bit integer option, in decimal, `0`-prefixed octal or `0x` hex.
 * As a list element, `lower-upper` expands to every value of the interval.
 */
export class IntegerDecoder implements Decoder<bigint> {
  readonly signedness: IntegerSignedness;

  constructor(signedness: IntegerSignedness = 'signed') {
    this.signedness = signedness;
  }

  decode(visitor: OptionsVisitor, name: string): bigint {
    return this.signedness === 'signed'
      ? visitor.decodeInt64(name)
      : visitor.decodeUint64(name);
  }
}
