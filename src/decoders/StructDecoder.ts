import type { OptionsVisitor } from '../OptionsVisitor';
import { Decoder } from './Decoder';

export interface StructField {
  /** Option name, also used as key in the output record. */
  name: string;
  /** Decoder for this field's type. */
  decoder: Decoder<unknown>;
  /** Whether the field may be absent. Absent fields are left unset. */
  optional?: boolean;
}

export interface StructOptions {
  /** Fields, decoded in definition order. */
  fields: readonly StructField[];
}

/**
 * Struct of named fields. Nested structs share the enclosing flat option
 * namespace; only the outermost struct checks for unrecognized options.
 */
export class StructDecoder implements Decoder<Record<string, unknown>> {
  private readonly _fields: readonly StructField[];

  constructor(options: StructOptions) {
    const seen = new Set<string>();
    for (const field of options.fields) {
      if (seen.has(field.name)) {
        throw new Error(`Duplicate struct field: '${field.name}'`);
      }
      seen.add(field.name);
    }
    this._fields = options.fields;
  }

  get fields(): readonly StructField[] {
    return this._fields;
  }

  decode(visitor: OptionsVisitor, _name: string): Record<string, unknown> {
    const outermost = visitor.depth === 0;
    const result = visitor.beginStruct();
    try {
      for (const field of this._fields) {
        if (field.optional && !visitor.hasField(field.name)) continue;
        result[field.name] = field.decoder.decode(visitor, field.name);
      }
    } catch (err) {
      // The pass cannot be resumed; release the index before propagating.
      if (outermost) visitor.discard();
      throw err;
    }
    visitor.endStruct();
    return result;
  }
}
