import { TextDecoder } from "node:util";
import type { Readable } from "node:stream";
import {
  type ColumnDescriptor,
  PRIMARY_HEADER_LENGTH,
  SECONDARY_HEADER_LENGTH,
  StorageKind,
  UTF_MAGIC,
  ValueKind,
  formatFlag,
  isStorageKind,
  isValueKind,
  splitColumnFlag,
} from "./format.js";
import {
  DataIntegrityError,
  SchemaMismatchError,
  StructuralError,
  TruncatedInputError,
} from "./errors.js";
import { type DecodePools, type PrimitiveOf, primitiveCodec } from "./primitive.js";
import { type ValueType, fromPrimitive, str, u8 } from "./value.js";
import { readStreamToBuffer } from "../io/streams.js";

export type TableReaderOptions = {
  /** When set, the table name stored in the file must match. */
  expectedName?: string;
};

export type TableHeader = {
  tableSize: number;
  rowOffset: number;
  stringOffset: number;
  blobOffset: number;
  tableNameOffset: number;
  fieldCount: number;
  rowSize: number;
  rowCount: number;
};

class RegionCursor {
  private position = 0;

  constructor(private readonly data: Buffer) {}

  get size(): number {
    return this.data.length;
  }

  hasMore(): boolean {
    return this.position < this.data.length;
  }

  take(length: number, context: string): Buffer {
    if (this.position + length > this.data.length) {
      throw new TruncatedInputError(context);
    }
    const bytes = this.data.subarray(this.position, this.position + length);
    this.position += length;
    return bytes;
  }
}

const toBuffer = (input: Uint8Array): Buffer =>
  Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);

export const parseTableHeader = (buffer: Buffer): TableHeader => {
  if (buffer.length < PRIMARY_HEADER_LENGTH) {
    throw new TruncatedInputError("@UTF header");
  }
  if (!buffer.subarray(0, 4).equals(UTF_MAGIC)) {
    throw StructuralError.malformedHeader("missing @UTF magic");
  }
  const tableSize = buffer.readUInt32BE(4);
  if (tableSize < SECONDARY_HEADER_LENGTH) {
    throw new TruncatedInputError("@UTF header");
  }
  if (buffer.length < PRIMARY_HEADER_LENGTH + SECONDARY_HEADER_LENGTH) {
    throw new TruncatedInputError("@UTF header");
  }

  const base = PRIMARY_HEADER_LENGTH;
  const header: TableHeader = {
    tableSize,
    rowOffset: buffer.readUInt32BE(base),
    stringOffset: buffer.readUInt32BE(base + 4),
    blobOffset: buffer.readUInt32BE(base + 8),
    tableNameOffset: buffer.readUInt32BE(base + 12),
    fieldCount: buffer.readUInt16BE(base + 16),
    rowSize: buffer.readUInt16BE(base + 18),
    rowCount: buffer.readUInt32BE(base + 20),
  };

  if (
    header.rowOffset < SECONDARY_HEADER_LENGTH ||
    header.rowOffset > header.stringOffset ||
    header.stringOffset > header.blobOffset ||
    header.blobOffset > header.tableSize ||
    header.rowSize * header.rowCount !== header.stringOffset - header.rowOffset
  ) {
    throw StructuralError.malformedHeader();
  }
  return header;
};

const parseStringPool = (pool: Buffer): Map<number, string> => {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  const strings = new Map<number, string>();
  let start = 0;
  for (let index = 0; index < pool.length; index += 1) {
    if (pool[index] !== 0) {
      continue;
    }
    try {
      strings.set(start, decoder.decode(pool.subarray(start, index)));
    } catch (error) {
      throw new DataIntegrityError(
        "StringMalformed",
        `error when decoding utf8 string at pool offset ${start}`,
        { cause: error }
      );
    }
    start = index + 1;
  }
  return strings;
};

/**
 * Sequential, schema-checked access to one UTF table.
 *
 * The whole table is validated and split into its four regions up front;
 * column and row values are then decoded on demand, in declaration order,
 * from two independent cursors.
 */
export class TableReader {
  private constructor(
    private readonly header: TableHeader,
    private readonly columns: RegionCursor,
    private readonly rows: RegionCursor,
    private readonly pools: DecodePools,
    readonly tableName: string
  ) {}

  static fromBuffer(input: Uint8Array, options: TableReaderOptions = {}): TableReader {
    const buffer = toBuffer(input);
    const header = parseTableHeader(buffer);

    const region = (from: number, to: number, context: string): Buffer => {
      if (PRIMARY_HEADER_LENGTH + to > buffer.length) {
        throw new TruncatedInputError(context);
      }
      return buffer.subarray(PRIMARY_HEADER_LENGTH + from, PRIMARY_HEADER_LENGTH + to);
    };

    const columnData = region(SECONDARY_HEADER_LENGTH, header.rowOffset, "UTF column data");
    const rowData = region(header.rowOffset, header.stringOffset, "UTF row data");
    const stringData = region(header.stringOffset, header.blobOffset, "UTF string data");
    const strings = parseStringPool(stringData);

    const tableName = strings.get(header.tableNameOffset);
    if (tableName === undefined) {
      throw StructuralError.malformedHeader("table name is not in the string pool");
    }
    if (options.expectedName !== undefined && tableName !== options.expectedName) {
      throw SchemaMismatchError.wrongTableSchema(
        `table name "${tableName}" (expected "${options.expectedName}")`
      );
    }

    const blobs = region(header.blobOffset, header.tableSize, "UTF blob data");

    return new TableReader(
      header,
      new RegionCursor(columnData),
      new RegionCursor(rowData),
      { strings, blobs },
      tableName
    );
  }

  static async fromStream(readable: Readable, options: TableReaderOptions = {}): Promise<TableReader> {
    const buffer = await readStreamToBuffer(readable);
    return TableReader.fromBuffer(buffer, options);
  }

  getHeader(): TableHeader {
    return { ...this.header };
  }

  get fieldCount(): number {
    return this.header.fieldCount;
  }

  get rowSize(): number {
    return this.header.rowSize;
  }

  get rowCount(): number {
    return this.header.rowCount;
  }

  moreColumnData(): boolean {
    return this.columns.hasMore();
  }

  moreRowData(): boolean {
    return this.rows.hasMore();
  }

  readColumnConstant<T, K extends ValueKind>(name: string, type: ValueType<T, K>): T {
    const storage = this.readExpectedColumn(name, type.kind);
    this.checkStorage(storage, [StorageKind.Constant], StorageKind.Constant);
    return this.readRawValue(type, false);
  }

  readColumnConstantOpt<T, K extends ValueKind>(name: string, type: ValueType<T, K>): T | null {
    const storage = this.readExpectedColumn(name, type.kind);
    this.checkStorage(storage, [StorageKind.Zero, StorageKind.Constant], StorageKind.Constant);
    return storage === StorageKind.Zero ? null : this.readRawValue(type, false);
  }

  readColumnRowed<T, K extends ValueKind>(name: string, type: ValueType<T, K>): void {
    const storage = this.readExpectedColumn(name, type.kind);
    this.checkStorage(storage, [StorageKind.Rowed], StorageKind.Rowed);
  }

  /** Returns false when the optional column is stored as Zero. */
  readColumnRowedOpt<T, K extends ValueKind>(name: string, type: ValueType<T, K>): boolean {
    const storage = this.readExpectedColumn(name, type.kind);
    this.checkStorage(storage, [StorageKind.Zero, StorageKind.Rowed], StorageKind.Rowed);
    return storage === StorageKind.Rowed;
  }

  /**
   * Reads a column flag and name without expectations. A Constant column's
   * value is left on the cursor: follow up with readPrimitive or
   * skipColumnValue.
   */
  readColumnDescriptor(): ColumnDescriptor {
    const flag = this.readRawValue(u8, false);
    const name = this.readRawValue(str, false);
    const { storage, kind } = splitColumnFlag(flag);
    if (!isValueKind(kind)) {
      throw StructuralError.invalidColumnType(kind);
    }
    if (!isStorageKind(storage)) {
      throw StructuralError.invalidColumnStorage(storage << 4);
    }
    return { name, storage, kind };
  }

  skipColumnValue(kind: ValueKind): void {
    const codec = primitiveCodec(kind);
    this.columns.take(codec.width, `reading ${codec.name} value`);
  }

  readRowValue<T, K extends ValueKind>(type: ValueType<T, K>): T {
    return this.readRawValue(type, true);
  }

  readPrimitive<K extends ValueKind>(kind: K, row: boolean): PrimitiveOf<K> {
    const codec = primitiveCodec(kind);
    const cursor = row ? this.rows : this.columns;
    const bytes = cursor.take(codec.width, `reading ${codec.name} value`);
    const value = codec.decode(bytes, this.pools);
    if (value === null) {
      throw codec.storage === "string"
        ? new DataIntegrityError("StringNotFound", `string not found at pool offset ${bytes.readUInt32BE(0)}`)
        : new DataIntegrityError(
            "BlobNotFound",
            `blob not found (offset ${bytes.readUInt32BE(0)}, length ${bytes.readUInt32BE(4)})`
          );
    }
    return value;
  }

  readRawValue<T, K extends ValueKind>(type: ValueType<T, K>, row: boolean): T {
    return fromPrimitive(type, this.readPrimitive(type.kind, row));
  }

  private readExpectedColumn(name: string, kind: ValueKind): number {
    const flag = this.readRawValue(u8, false);
    const columnName = this.readRawValue(str, false);
    if (columnName !== name) {
      throw SchemaMismatchError.wrongColumnName(columnName, name);
    }
    const split = splitColumnFlag(flag);
    if (split.kind !== kind) {
      throw isValueKind(split.kind)
        ? SchemaMismatchError.wrongColumnType(split.kind, kind)
        : StructuralError.invalidColumnType(split.kind);
    }
    return split.storage;
  }

  private checkStorage(storage: number, accepted: readonly StorageKind[], expected: StorageKind): void {
    if (isStorageKind(storage) && accepted.includes(storage)) {
      return;
    }
    throw isStorageKind(storage)
      ? SchemaMismatchError.wrongColumnStorage(storage << 4, formatFlag(expected << 4))
      : StructuralError.invalidColumnStorage(storage << 4);
  }
}
