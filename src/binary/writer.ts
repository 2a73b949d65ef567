import type { Writable } from "node:stream";
import { ByteSink } from "./byteSink.js";
import {
  BLOB_ALIGNMENT,
  type ColumnDescriptor,
  NULL_STRING,
  PRIMARY_HEADER_LENGTH,
  SECONDARY_HEADER_LENGTH,
  StorageKind,
  TABLE_NAME_STRING_OFFSET,
  UTF_MAGIC,
  ValueKind,
  columnFlag,
  valueKindName,
} from "./format.js";
import { ValueConversionError, WriteConsistencyError } from "./errors.js";
import { EncodePools, type PrimitiveOf, type PrimitiveValue, primitiveCodec } from "./primitive.js";
import { type ValueType, toPrimitive } from "./value.js";
import { writeChunks } from "../io/streams.js";

const MAX_U16 = 0xffff;
const MAX_U32 = 0xffffffff;

export type WriterStats = {
  fieldCount: number;
  columnBytes: number;
  rowBytes: number;
  strings: {
    uniqueCount: number;
    poolBytes: number;
  };
  blobBytes: number;
};

/**
 * Remembers whether optional rowed columns were stored as Rowed (included)
 * or Zero. A table with no rows carries no other evidence of that choice, so
 * the context travels with the decoded table and is consulted on write.
 */
export class WriteContext {
  private readonly inclusion = new Map<string, boolean>();

  /** Columns never recorded count as included. */
  isIncluded(columnName: string): boolean {
    return this.inclusion.get(columnName) ?? true;
  }

  setInclusionState(columnName: string, included: boolean): void {
    this.inclusion.set(columnName, included);
  }

  entries(): Array<[string, boolean]> {
    return [...this.inclusion.entries()];
  }
}

/**
 * Accumulates column descriptors and row values, then lays the table out in
 * one pass. Strings are deduplicated across the writer's whole lifetime;
 * blobs are always appended.
 */
export class TableWriter {
  private readonly columnData = new ByteSink();
  private readonly rowData = new ByteSink();
  private readonly pools = new EncodePools();
  private fieldCount = 0;

  constructor(readonly tableName: string) {
    if (tableName.includes("\0")) {
      throw new ValueConversionError("string", "table name", new RangeError("table names cannot contain NUL"));
    }
    this.pools.appendString(NULL_STRING);
    // The header always points at offset 7, even if the name is "<NULL>" itself.
    this.pools.appendString(tableName);
  }

  pushConstantColumn<T, K extends ValueKind>(name: string, type: ValueType<T, K>, value: T): void {
    const header = this.encodeColumnHeader(name, StorageKind.Constant, type.kind);
    const bytes = primitiveCodec(type.kind).encode(toPrimitive(type, value), this.pools);
    this.commitColumn(header, bytes);
  }

  pushConstantColumnOpt<T, K extends ValueKind>(name: string, type: ValueType<T, K>, value: T | null): void {
    if (value === null) {
      this.commitColumn(this.encodeColumnHeader(name, StorageKind.Zero, type.kind));
      return;
    }
    this.pushConstantColumn(name, type, value);
  }

  pushRowedColumn<T, K extends ValueKind>(name: string, type: ValueType<T, K>): void {
    this.commitColumn(this.encodeColumnHeader(name, StorageKind.Rowed, type.kind));
  }

  pushRowedColumnOpt<T, K extends ValueKind>(name: string, type: ValueType<T, K>, included: boolean): void {
    const storage = included ? StorageKind.Rowed : StorageKind.Zero;
    this.commitColumn(this.encodeColumnHeader(name, storage, type.kind));
  }

  /** Pushes a column described only by its on-disk kinds. */
  pushColumn(descriptor: ColumnDescriptor, value?: PrimitiveValue): void {
    const header = this.encodeColumnHeader(descriptor.name, descriptor.storage, descriptor.kind);
    if (descriptor.storage !== StorageKind.Constant) {
      this.commitColumn(header);
      return;
    }
    if (value === undefined) {
      throw new ValueConversionError(
        "undefined",
        valueKindName(descriptor.kind),
        new TypeError(`constant column "${descriptor.name}" has no value`)
      );
    }
    this.commitColumn(header, primitiveCodec(descriptor.kind).encode(value, this.pools));
  }

  writeRawValue<T, K extends ValueKind>(type: ValueType<T, K>, row: boolean, value: T): void {
    this.writePrimitive(type.kind, row, toPrimitive(type, value));
  }

  writePrimitive<K extends ValueKind>(kind: K, row: boolean, value: PrimitiveOf<K>): void {
    const bytes = primitiveCodec(kind).encode(value, this.pools);
    (row ? this.rowData : this.columnData).writeBytes(bytes);
  }

  getStats(): WriterStats {
    return {
      fieldCount: this.fieldCount,
      columnBytes: this.columnData.length,
      rowBytes: this.rowData.length,
      strings: {
        uniqueCount: this.pools.uniqueStringCount,
        poolBytes: this.pools.strings.length,
      },
      blobBytes: this.pools.blobs.length,
    };
  }

  /**
   * Verifies the row area holds exactly `rowSize * rowCount` bytes and
   * returns the finished table.
   */
  end(rowSize: number, rowCount: number): Buffer {
    return Buffer.concat(this.layout(rowSize, rowCount));
  }

  async endTo(stream: Writable, rowSize: number, rowCount: number): Promise<void> {
    await writeChunks(stream, this.layout(rowSize, rowCount));
  }

  private encodeColumnHeader(name: string, storage: StorageKind, kind: ValueKind): Buffer[] {
    return [
      primitiveCodec(ValueKind.U8).encode(columnFlag(storage, kind), this.pools),
      primitiveCodec(ValueKind.STR).encode(name, this.pools),
    ];
  }

  /** Column bytes are only stored once the header and the value have both encoded. */
  private commitColumn(header: readonly Buffer[], value?: Buffer): void {
    for (const bytes of header) {
      this.columnData.writeBytes(bytes);
    }
    if (value !== undefined) {
      this.columnData.writeBytes(value);
    }
    this.fieldCount += 1;
  }

  private layout(rowSize: number, rowCount: number): Buffer[] {
    if (!Number.isInteger(rowSize) || rowSize < 0 || rowSize > MAX_U16) {
      throw new WriteConsistencyError("RowSizeMismatch", `row size ${rowSize} does not fit in a u16`);
    }
    if (!Number.isInteger(rowCount) || rowCount < 0 || rowCount > MAX_U32) {
      throw new WriteConsistencyError("RowSizeMismatch", `row count ${rowCount} does not fit in a u32`);
    }
    if (this.rowData.length !== rowSize * rowCount) {
      throw new WriteConsistencyError(
        "RowSizeMismatch",
        `row data is ${this.rowData.length} bytes, expected ${rowSize} x ${rowCount}`
      );
    }
    if (this.fieldCount > MAX_U16) {
      throw new WriteConsistencyError("FieldCountOverflow", `${this.fieldCount} columns do not fit in a u16`);
    }

    const strings = this.pools.strings.view();
    const blobs = this.pools.blobs.view();
    const rowOffset = SECONDARY_HEADER_LENGTH + this.columnData.length;
    const stringOffset = rowOffset + this.rowData.length;
    const stringEnd = stringOffset + strings.length;
    const blobOffset = Math.ceil(stringEnd / BLOB_ALIGNMENT) * BLOB_ALIGNMENT;
    const tableSize = blobOffset + blobs.length;

    const header = Buffer.alloc(PRIMARY_HEADER_LENGTH + SECONDARY_HEADER_LENGTH);
    UTF_MAGIC.copy(header, 0);
    header.writeUInt32BE(tableSize, 4);
    header.writeUInt32BE(rowOffset, 8);
    header.writeUInt32BE(stringOffset, 12);
    header.writeUInt32BE(blobOffset, 16);
    header.writeUInt32BE(TABLE_NAME_STRING_OFFSET, 20);
    header.writeUInt16BE(this.fieldCount, 24);
    header.writeUInt16BE(rowSize, 26);
    header.writeUInt32BE(rowCount, 28);

    return [
      header,
      this.columnData.toBuffer(),
      this.rowData.toBuffer(),
      Buffer.from(strings),
      Buffer.alloc(blobOffset - stringEnd),
      Buffer.from(blobs),
    ];
  }
}
