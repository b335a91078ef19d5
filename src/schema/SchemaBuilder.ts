import { Decoder } from '../decoders/Decoder';
import { StringDecoder } from '../decoders/StringDecoder';
import { BooleanDecoder } from '../decoders/BooleanDecoder';
import { IntegerDecoder } from '../decoders/IntegerDecoder';
import { SizeDecoder } from '../decoders/SizeDecoder';
import { EnumDecoder } from '../decoders/EnumDecoder';
import { StructDecoder } from '../decoders/StructDecoder';
import { ListDecoder } from '../decoders/ListDecoder';

export interface SchemaField {
  name: string;
  schema: SchemaNode;
  optional?: boolean;
}

/**
 * JSON-serializable schema definition for a decoded option value.
 */
export type SchemaNode =
  | { type: 'str' }
  | { type: 'bool' }
  | { type: 'int' }
  | { type: 'uint64' }
  | { type: 'size' }
  | { type: 'enum'; values: string[] }
  | { type: 'struct'; fields: SchemaField[] }
  | { type: 'list'; item: SchemaNode };

const SCALAR_TYPES: ReadonlySet<SchemaNode['type']> = new Set<SchemaNode['type']>(['str', 'bool', 'int', 'uint64', 'size', 'enum']);

/**
 * Builds a Decoder from a JSON schema definition.
 */
export class SchemaBuilder {
  /** Build a Decoder from a schema node definition. */
  static build(node: SchemaNode): Decoder<unknown> {
    switch (node.type) {
      case 'str':
        return new StringDecoder();

      case 'bool':
        return new BooleanDecoder();

      case 'int':
        return new IntegerDecoder('signed');

      case 'uint64':
        return new IntegerDecoder('unsigned');

      case 'size':
        return new SizeDecoder();

      case 'enum':
        return new EnumDecoder({ values: node.values });

      case 'struct':
        return new StructDecoder({
          fields: node.fields.map(f => ({
            name: f.name,
            decoder: SchemaBuilder.build(f.schema),
            optional: f.optional,
          })),
        });

      case 'list':
        SchemaBuilder.checkListItem(node.item);
        return new ListDecoder(SchemaBuilder.build(node.item));

      default:
        throw new Error(`Unknown schema type: ${(node as { type: string }).type}`);
    }
  }

  /** Parse a JSON string into a SchemaNode and build the decoder. */
  static fromJSON(json: string): Decoder<unknown> {
    const node = JSON.parse(json) as SchemaNode;
    return SchemaBuilder.build(node);
  }

  /**
   * A list element is a scalar, or a struct wrapping exactly one mandatory
   * scalar member. Lists do not nest.
   */
  private static checkListItem(item: SchemaNode): void {
    if (SCALAR_TYPES.has(item.type)) return;
    if (item.type === 'struct') {
      const [member, ...others] = item.fields;
      if (member && others.length === 0 && !member.optional && SCALAR_TYPES.has(member.schema.type)) {
        return;
      }
      throw new Error('List element structs must have exactly one mandatory scalar member');
    }
    throw new Error(`Unsupported list element type: '${item.type}'`);
  }
}
