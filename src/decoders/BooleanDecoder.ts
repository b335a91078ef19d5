import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

/**
 * Boolean option: `on|yes|y` or `off|no|n`, case-sensitive.
 * A bare `name` means true.
 */
export class BooleanDecoder implements Decoder<boolean> {
  decode(visitor: OptionsVisitor, name: string): boolean {
    return visitor.decodeBool(name);
  }
}
