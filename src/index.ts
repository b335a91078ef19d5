export { OptionsVisitor } from './OptionsVisitor';
export type { RawOption, OptionSource } from './RawOption';
export { ID_OPTION_NAME } from './RawOption';
export { UnprocessedIndex, OptionQueue } from './UnprocessedIndex';
export type { ListState, ListMode } from './ListState';
export {
  OptionsError,
  MissingParameterError,
  InvalidParameterError,
  InvalidParameterValueError,
  VisitorProtocolError,
} from './errors';
export type { OptionsErrorKind } from './errors';
export {
  INT64_MIN,
  INT64_MAX,
  UINT64_MAX,
  RANGE_MAX,
  parseInt64,
  parseUint64,
  parseSize,
} from './helpers';
export type { Decoder } from './decoders/Decoder';
export { StringDecoder } from './decoders/StringDecoder';
export { BooleanDecoder } from './decoders/BooleanDecoder';
export { IntegerDecoder } from './decoders/IntegerDecoder';
export type { IntegerSignedness } from './decoders/IntegerDecoder';
export { SizeDecoder } from './decoders/SizeDecoder';
export { EnumDecoder } from './decoders/EnumDecoder';
export type { EnumOptions } from './decoders/EnumDecoder';
export { StructDecoder } from './decoders/StructDecoder';
export type { StructField, StructOptions } from './decoders/StructDecoder';
export { ListDecoder } from './decoders/ListDecoder';
export { SchemaBuilder } from './schema/SchemaBuilder';
export type { SchemaNode, SchemaField } from './schema/SchemaBuilder';
export { SchemaDecoder } from './schema/SchemaDecoder';
