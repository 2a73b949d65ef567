import type { Readable } from "node:stream";
import { type ColumnDescriptor, StorageKind } from "./format.js";
import { TableReader } from "./reader.js";
import { readStreamToBuffer } from "../io/streams.js";

/**
 * Structure of a UTF table (name, column order, kinds and storage) read
 * without decoding any row or constant values. Useful to pick between
 * several candidate table definitions before decoding.
 */
export class Schema {
  private constructor(
    readonly tableName: string,
    readonly columns: readonly ColumnDescriptor[]
  ) {}

  static read(input: Uint8Array): Schema {
    const reader = TableReader.fromBuffer(input);
    const columns: ColumnDescriptor[] = [];
    while (reader.moreColumnData()) {
      const column = reader.readColumnDescriptor();
      if (column.storage === StorageKind.Constant) {
        reader.skipColumnValue(column.kind);
      }
      columns.push(column);
    }
    return new Schema(reader.tableName, columns);
  }

  static async fromStream(readable: Readable): Promise<Schema> {
    return Schema.read(await readStreamToBuffer(readable));
  }

  hasColumn(name: string): boolean {
    return this.columns.some((column) => column.name === name);
  }

  getColumn(name: string): ColumnDescriptor | undefined {
    return this.columns.find((column) => column.name === name);
  }
}

export const readSchema = (input: Uint8Array): Schema => Schema.read(input);
