import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

export interface EnumOptions<T extends string = string> {
  /** Accepted tags, in definition order. */
  values: readonly T[];
}

/** Enumerated option matched exactly against its accepted tags. */
export class EnumDecoder<T extends string = string> implements Decoder<T> {
  private readonly _values: readonly T[];

  constructor(options: EnumOptions<T>) {
    if (options.values.length === 0) {
      throw new Error('Enumerated type must have at least one value');
    }
    this._values = options.values;
  }

  get values(): readonly T[] {
    return this._values;
  }

  decode(visitor: OptionsVisitor, name: string): T {
    return visitor.decodeEnum(name, this._values);
  }
}
