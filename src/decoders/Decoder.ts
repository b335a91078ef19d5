import type { OptionsVisitor } from '../OptionsVisitor';

/**
 * Base interface for all option decoders.
 * @template T The TypeScript type this decoder produces.
 */
export interface Decoder<T> {
  /**
   * Decode the field `name` through the visitor. Throws an `OptionsError` if
   * the options are missing or malformed.
   */
  decode(visitor: OptionsVisitor, name: string): T;
}
