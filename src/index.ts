export {
  UtfTableError,
  StructuralError,
  TruncatedInputError,
  SchemaMismatchError,
  DataIntegrityError,
  ValueConversionError,
  CipherError,
  WriteConsistencyError,
  isUtfTableError,
} from "./binary/errors.js";
export type { UtfErrorCode } from "./binary/errors.js";
export {
  ValueKind,
  StorageKind,
  UTF_MAGIC,
  NULL_STRING,
  valueKindName,
  storageKindName,
  parseValueKind,
  parseStorageKind,
} from "./binary/format.js";
export type { ColumnDescriptor } from "./binary/format.js";
export { EncodePools, primitiveCodec, primitiveWidth, defaultPrimitive } from "./binary/primitive.js";
export type { PrimitiveCodec, PrimitiveOf, PrimitiveValue, DecodePools } from "./binary/primitive.js";
export {
  u8,
  i8,
  u16,
  i16,
  u32,
  i32,
  u64,
  i64,
  f32,
  str,
  blob,
  bool,
  fixedBytes,
  defineValue,
  defaultValueOf,
  fromPrimitive,
  toPrimitive,
  WrongSizeError,
} from "./binary/value.js";
export type { ValueType, ValueOf } from "./binary/value.js";
export { TableReader, parseTableHeader } from "./binary/reader.js";
export type { TableHeader, TableReaderOptions } from "./binary/reader.js";
export { TableWriter, WriteContext } from "./binary/writer.js";
export type { WriterStats } from "./binary/writer.js";
export { Schema, readSchema } from "./binary/schema.js";
export {
  MASK,
  CIPHER_GUARD,
  maskBuffer,
  maskInto,
  canUnmask,
  detectCipherCapabilities,
  selectCipherStrategy,
} from "./packet/cipher.js";
export type { CipherCapabilities, CipherOptions, CipherStrategy } from "./packet/cipher.js";
export { Packet, DEFAULT_MAX_PAYLOAD_BYTES } from "./packet/packet.js";
export type { PacketReadOptions } from "./packet/packet.js";
export type { TableCodec } from "./table/codec.js";
export {
  defineTable,
  constant,
  rowed,
  optionalConstant,
  optionalRowed,
  toColumnName,
  TableDefinition,
} from "./table/definition.js";
export type { ColumnSpec, ColumnMap, ConstantsOf, RowOf, TableOf } from "./table/definition.js";
export {
  readDynamicTable,
  writeDynamicTable,
  dynamicTableCodec,
  getColumnValue,
  setColumnValue,
} from "./table/dynamic.js";
export type { DynamicTable } from "./table/dynamic.js";
export {
  ManifestError,
  readManifest,
  manifestToTable,
  tableToManifest,
  stringifyManifest,
} from "./table/manifest.js";
export { DEFAULT_MAX_DEPTH, parseJsonStream } from "./parser/streamParser.js";
export type { JsonStreamOptions, JsonTokenHandler } from "./parser/streamParser.js";
export { JsonAssembler } from "./parser/jsonAssembler.js";
export { JsonNumber, stringifyJson } from "./parser/jsonValue.js";
export type { JsonValue, JsonObject } from "./parser/jsonValue.js";
