import { SchemaMismatchError, WriteConsistencyError } from "../binary/errors.js";
import { type ColumnDescriptor, StorageKind } from "../binary/format.js";
import { type PrimitiveValue, primitiveWidth } from "../binary/primitive.js";
import { TableReader } from "../binary/reader.js";
import { TableWriter } from "../binary/writer.js";
import type { TableCodec } from "./codec.js";

/**
 * A table decoded without a definition. Constant columns hold their value,
 * Zero columns hold null, and every row maps Rowed column names to values.
 */
export type DynamicTable = {
  tableName: string;
  columns: ColumnDescriptor[];
  constants: Record<string, PrimitiveValue | null>;
  rows: Array<Record<string, PrimitiveValue>>;
};

/**
 * Stores `value` under a column name read from a file, as an own property
 * even for names such as `__proto__`.
 */
export const setColumnValue = <V>(record: Record<string, V>, name: string, value: V): void => {
  Object.defineProperty(record, name, { value, enumerable: true, writable: true, configurable: true });
};

export const getColumnValue = <V>(record: Record<string, V>, name: string): V | undefined =>
  Object.hasOwn(record, name) ? record[name] : undefined;

const rowedColumns = (columns: readonly ColumnDescriptor[]): ColumnDescriptor[] =>
  columns.filter((column) => column.storage === StorageKind.Rowed);

export const dynamicRowSize = (columns: readonly ColumnDescriptor[]): number =>
  rowedColumns(columns).reduce((size, column) => size + primitiveWidth(column.kind), 0);

export const readDynamicTable = (input: Uint8Array): DynamicTable => {
  const reader = TableReader.fromBuffer(input);
  const columns: ColumnDescriptor[] = [];
  const constants: Record<string, PrimitiveValue | null> = {};

  while (reader.moreColumnData()) {
    const column = reader.readColumnDescriptor();
    columns.push(column);
    if (column.storage === StorageKind.Constant) {
      setColumnValue(constants, column.name, reader.readPrimitive(column.kind, false));
    } else if (column.storage === StorageKind.Zero) {
      setColumnValue(constants, column.name, null);
    }
  }
  if (columns.length !== reader.fieldCount) {
    throw SchemaMismatchError.wrongTableSchema(
      `${columns.length} columns decoded (header declares ${reader.fieldCount})`
    );
  }

  const rowed = rowedColumns(columns);
  const rowSize = dynamicRowSize(columns);
  if (rowSize !== reader.rowSize) {
    throw SchemaMismatchError.wrongTableSchema(`row size ${reader.rowSize} (columns need ${rowSize})`);
  }

  const rows: Array<Record<string, PrimitiveValue>> = [];
  for (let index = 0; index < reader.rowCount; index += 1) {
    const row: Record<string, PrimitiveValue> = {};
    for (const column of rowed) {
      setColumnValue(row, column.name, reader.readPrimitive(column.kind, true));
    }
    rows.push(row);
  }

  return { tableName: reader.tableName, columns, constants, rows };
};

export const writeDynamicTable = (table: DynamicTable): Buffer => {
  const writer = new TableWriter(table.tableName);
  for (const column of table.columns) {
    writer.pushColumn(column, getColumnValue(table.constants, column.name) ?? undefined);
  }

  const rowed = rowedColumns(table.columns);
  table.rows.forEach((row, index) => {
    for (const column of rowed) {
      const value = getColumnValue(row, column.name);
      if (value === undefined) {
        throw new WriteConsistencyError(
          "MissingRowValue",
          `row ${index} has no value for column "${column.name}"`,
          column.name
        );
      }
      writer.writePrimitive(column.kind, true, value);
    }
  });

  return writer.end(dynamicRowSize(table.columns), table.rows.length);
};

export const dynamicTableCodec = (tableName: string): TableCodec<DynamicTable> => ({
  create: () => ({ tableName, columns: [], constants: {}, rows: [] }),
  read: (input) => {
    const table = readDynamicTable(input);
    if (table.tableName !== tableName) {
      throw SchemaMismatchError.wrongTableSchema(
        `table name "${table.tableName}" (expected "${tableName}")`
      );
    }
    return table;
  },
  write: writeDynamicTable,
});
