import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

/**
 * List built from the repeated occurrences of one option name, in source
 * order. Integer elements may be written as ranges (`3-7`).
 */
export class ListDecoder<T = unknown> implements Decoder<T[]> {
  private readonly _itemDecoder: Decoder<T>;

  constructor(itemDecoder: Decoder<T>) {
    this._itemDecoder = itemDecoder;
  }

  get itemDecoder(): Decoder<T> {
    return this._itemDecoder;
  }

  decode(visitor: OptionsVisitor, name: string): T[] {
    const items: T[] = [];
    visitor.beginList(name);
    try {
      while (visitor.nextListElement()) {
        items.push(this._itemDecoder.decode(visitor, name));
      }
    } finally {
      visitor.endList();
    }
    return items;
  }
}
