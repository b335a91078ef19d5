import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

/** Byte size with optional binary unit suffix (`512`, `64k`, `1.5G`). */
export class SizeDecoder implements Decoder<bigint> {
  decode(visitor: OptionsVisitor, name: string): bigint {
    return visitor.decodeSize(name);
  }
}
