import type { Writable } from "node:stream";
import { SchemaMismatchError, WriteConsistencyError } from "../binary/errors.js";
import type { ValueKind } from "../binary/format.js";
import { primitiveWidth } from "../binary/primitive.js";
import { TableReader } from "../binary/reader.js";
import { type ValueType, defaultValueOf } from "../binary/value.js";
import { TableWriter, WriteContext } from "../binary/writer.js";
import { writeChunks } from "../io/streams.js";
import type { TableCodec } from "./codec.js";

export type ColumnStorage = "constant" | "rowed";

export interface ColumnSpec<T, S extends ColumnStorage = ColumnStorage, O extends boolean = boolean> {
  readonly type: ValueType<T, ValueKind>;
  readonly storage: S;
  readonly optional: O;
  /** Column name on disk; defaults to the field name in UpperCamelCase. */
  readonly name?: string;
  /** Whether a freshly created table stores an optional column. */
  readonly included: boolean;
}

export type ColumnMap = Readonly<Record<string, ColumnSpec<unknown>>>;

export type ColumnOptions = { name?: string };
export type OptionalColumnOptions = ColumnOptions & { included?: boolean };

type ColumnValue<C> = C extends ColumnSpec<infer T, ColumnStorage, infer O>
  ? O extends true
    ? T | null
    : T
  : never;

type FieldsStoredAs<M, S extends ColumnStorage> = {
  [K in keyof M]: M[K] extends { readonly storage: S } ? K : never;
}[keyof M];

export type ConstantsOf<M extends ColumnMap> = {
  [K in FieldsStoredAs<M, "constant">]: ColumnValue<M[K]>;
};

export type RowOf<M extends ColumnMap> = {
  [K in FieldsStoredAs<M, "rowed">]: ColumnValue<M[K]>;
};

export type TableOf<M extends ColumnMap> = {
  constants: ConstantsOf<M>;
  rows: RowOf<M>[];
  writeContext: WriteContext;
};

export const constant = <T>(
  type: ValueType<T, ValueKind>,
  options: ColumnOptions = {}
): ColumnSpec<T, "constant", false> => ({
  type,
  storage: "constant",
  optional: false,
  name: options.name,
  included: true,
});

export const optionalConstant = <T>(
  type: ValueType<T, ValueKind>,
  options: OptionalColumnOptions = {}
): ColumnSpec<T, "constant", true> => ({
  type,
  storage: "constant",
  optional: true,
  name: options.name,
  included: options.included ?? false,
});

export const rowed = <T>(
  type: ValueType<T, ValueKind>,
  options: ColumnOptions = {}
): ColumnSpec<T, "rowed", false> => ({
  type,
  storage: "rowed",
  optional: false,
  name: options.name,
  included: true,
});

export const optionalRowed = <T>(
  type: ValueType<T, ValueKind>,
  options: OptionalColumnOptions = {}
): ColumnSpec<T, "rowed", true> => ({
  type,
  storage: "rowed",
  optional: true,
  name: options.name,
  included: options.included ?? false,
});

/** `fileName` and `file_name` both become `FileName`. */
export const toColumnName = (field: string): string =>
  field
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join("");

export type ResolvedColumn = {
  field: string;
  name: string;
  spec: ColumnSpec<unknown>;
};

const fieldOf = (record: object, field: string): unknown =>
  Object.hasOwn(record, field) ? Reflect.get(record, field) : undefined;

/**
 * A table shape described at run time. Reading checks the table name, the
 * field count and every column's name, kind and storage in declaration
 * order; writing reproduces the same layout.
 */
export class TableDefinition<M extends ColumnMap> implements TableCodec<TableOf<M>> {
  readonly columns: readonly ResolvedColumn[];

  constructor(
    readonly tableName: string,
    columns: M
  ) {
    const entries: Array<[string, ColumnSpec<unknown>]> = Object.entries(columns);
    const seen = new Set<string>();
    this.columns = entries.map(([field, spec]) => {
      const name = spec.name ?? toColumnName(field);
      if (seen.has(name)) {
        throw new TypeError(`defineTable: duplicate column name "${name}" in table "${tableName}"`);
      }
      seen.add(name);
      return { field, name, spec };
    });
  }

  create(): TableOf<M> {
    const constants: Record<string, unknown> = {};
    const writeContext = new WriteContext();
    for (const { field, name, spec } of this.columns) {
      if (spec.storage === "constant") {
        constants[field] = spec.optional && !spec.included ? null : defaultValueOf(spec.type);
      } else if (spec.optional) {
        writeContext.setInclusionState(name, spec.included);
      }
    }
    this.assertConstants(constants);
    return { constants, rows: [], writeContext };
  }

  read(input: Uint8Array): TableOf<M> {
    const reader = TableReader.fromBuffer(input);
    if (reader.tableName !== this.tableName) {
      throw SchemaMismatchError.wrongTableSchema(
        `table name "${reader.tableName}" (expected "${this.tableName}")`
      );
    }
    if (reader.fieldCount !== this.columns.length) {
      throw SchemaMismatchError.wrongTableSchema(
        `${reader.fieldCount} columns (expected ${this.columns.length})`
      );
    }

    const constants: Record<string, unknown> = {};
    const writeContext = new WriteContext();
    const rowed: Array<{ column: ResolvedColumn; present: boolean }> = [];

    for (const column of this.columns) {
      const { field, name, spec } = column;
      if (spec.storage === "constant") {
        constants[field] = spec.optional
          ? reader.readColumnConstantOpt(name, spec.type)
          : reader.readColumnConstant(name, spec.type);
        continue;
      }
      let present = true;
      if (spec.optional) {
        present = reader.readColumnRowedOpt(name, spec.type);
        writeContext.setInclusionState(name, present);
      } else {
        reader.readColumnRowed(name, spec.type);
      }
      rowed.push({ column, present });
    }
    this.assertConstants(constants);

    const rowSize = rowed.reduce(
      (size, { column, present }) => size + (present ? primitiveWidth(column.spec.type.kind) : 0),
      0
    );
    if (rowSize !== reader.rowSize) {
      throw SchemaMismatchError.wrongTableSchema(`row size ${reader.rowSize} (expected ${rowSize})`);
    }

    const rows: RowOf<M>[] = [];
    for (let index = 0; index < reader.rowCount; index += 1) {
      const row: Record<string, unknown> = {};
      for (const { column, present } of rowed) {
        row[column.field] = present ? reader.readRowValue(column.spec.type) : null;
      }
      this.assertRow(row);
      rows.push(row);
    }

    return { constants, rows, writeContext };
  }

  write(table: TableOf<M>): Buffer {
    const { writer, rowSize, rowCount } = this.encode(table);
    return writer.end(rowSize, rowCount);
  }

  async writeTo(stream: Writable, table: TableOf<M>): Promise<void> {
    await writeChunks(stream, [this.write(table)]);
  }

  private encode(table: TableOf<M>): { writer: TableWriter; rowSize: number; rowCount: number } {
    const writer = new TableWriter(this.tableName);
    const rowed: Array<{ column: ResolvedColumn; included: boolean }> = [];

    for (const column of this.columns) {
      const { field, name, spec } = column;
      if (spec.storage === "constant") {
        const value = fieldOf(table.constants, field);
        if (spec.optional) {
          writer.pushConstantColumnOpt(name, spec.type, value ?? null);
        } else {
          writer.pushConstantColumn(name, spec.type, value);
        }
        continue;
      }
      if (spec.optional) {
        const first = table.rows[0];
        const included =
          first === undefined ? table.writeContext.isIncluded(name) : fieldOf(first, field) != null;
        writer.pushRowedColumnOpt(name, spec.type, included);
        rowed.push({ column, included });
      } else {
        writer.pushRowedColumn(name, spec.type);
        rowed.push({ column, included: true });
      }
    }

    for (const row of table.rows) {
      for (const { column, included } of rowed) {
        const value = fieldOf(row, column.field);
        if (column.spec.optional) {
          const present = value != null;
          if (present !== included) {
            throw WriteConsistencyError.optionalColumnConflict(column.name);
          }
          if (!present) {
            continue;
          }
        }
        writer.writeRawValue(column.spec.type, true, value);
      }
    }

    const rowSize = rowed.reduce(
      (size, { column, included }) => size + (included ? primitiveWidth(column.spec.type.kind) : 0),
      0
    );
    return { writer, rowSize, rowCount: table.rows.length };
  }

  private assertConstants(record: object): asserts record is ConstantsOf<M> {
    this.assertFields(record, "constant");
  }

  private assertRow(record: object): asserts record is RowOf<M> {
    this.assertFields(record, "rowed");
  }

  private assertFields(record: object, storage: ColumnStorage): void {
    for (const { field, spec } of this.columns) {
      if (spec.storage === storage && !Object.hasOwn(record, field)) {
        throw SchemaMismatchError.wrongTableSchema(`missing ${storage} field "${field}"`);
      }
    }
  }
}

export const defineTable = <M extends ColumnMap>(tableName: string, columns: M): TableDefinition<M> =>
  new TableDefinition(tableName, columns);
