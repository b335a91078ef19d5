import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

/** `name=text`; a bare `name` decodes to the empty string. */
export class StringDecoder implements Decoder<string> {
  decode(visitor: OptionsVisitor, name: string): string {
    return visitor.decodeString(name);
  }
}
