import { OptionsVisitor } from '../OptionsVisitor';
import type { OptionSource, RawOption } from '../RawOption';
import { Decoder } from '../decoders/Decoder';
import { SchemaBuilder, SchemaNode } from './SchemaBuilder';

/**
 * High-level decoder that wraps a struct schema definition.
 * Runs one visitor pass per call.
 */
export class SchemaDecoder {
  private readonly _decoder: Decoder<unknown>;

  constructor(schema: SchemaNode) {
    if (schema.type !== 'struct') {
      throw new Error(`Top-level schema must be a struct, got '${schema.type}'`);
    }
    this._decoder = SchemaBuilder.build(schema);
  }

  /** Decode an option source into a record shaped by the schema. */
  decode(source: OptionSource): unknown {
    return this._decoder.decode(new OptionsVisitor(source), '');
  }

  /** Decode bare occurrences, optionally with an identifier. */
  decodeOptions(options: readonly RawOption[], id?: string): unknown {
    return this.decode({ options, id });
  }

  /** Access the underlying built decoder. */
  get decoder(): Decoder<unknown> {
    return this._decoder;
  }
}
