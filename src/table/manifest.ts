import type { Readable } from "node:stream";
import { SchemaMismatchError, WriteConsistencyError } from "../binary/errors.js";
import {
  type ColumnDescriptor,
  StorageKind,
  ValueKind,
  parseStorageKind,
  parseValueKind,
  storageKindName,
  valueKindName,
} from "../binary/format.js";
import { type PrimitiveValue, primitiveCodec } from "../binary/primitive.js";
import { JsonAssembler } from "../parser/jsonAssembler.js";
import {
  JsonNumber,
  type JsonObject,
  type JsonValue,
  getJsonProperty,
  isJsonObject,
  setJsonProperty,
  stringifyJson,
} from "../parser/jsonValue.js";
import { parseJsonStream } from "../parser/streamParser.js";
import { type DynamicTable, getColumnValue, setColumnValue } from "./dynamic.js";

/** A JSON manifest that does not describe a valid table. `path` points at the offending member. */
export class ManifestError extends SchemaMismatchError {
  constructor(
    readonly path: string,
    detail: string
  ) {
    super("InvalidManifest", `invalid manifest at ${path}: ${detail}`);
    this.name = "ManifestError";
  }
}

const DECIMAL_INTEGER = /^-?\d+$/;
const HEX_BYTES = /^(?:[0-9a-fA-F]{2})*$/;
const NON_FINITE: Readonly<Record<string, number>> = {
  NaN: Number.NaN,
  Infinity: Number.POSITIVE_INFINITY,
  "-Infinity": Number.NEGATIVE_INFINITY,
};

const describeJson = (value: JsonValue): string => {
  if (value === null) return "null";
  if (value instanceof JsonNumber) return "number";
  if (Array.isArray(value)) return "array";
  return typeof value;
};

const expectObject = (value: JsonValue | undefined, path: string): JsonObject => {
  if (value === undefined || !isJsonObject(value)) {
    throw new ManifestError(path, `expected an object, got ${value === undefined ? "nothing" : describeJson(value)}`);
  }
  return value;
};

const expectArray = (value: JsonValue | undefined, path: string): JsonValue[] => {
  if (!Array.isArray(value)) {
    throw new ManifestError(path, `expected an array, got ${value === undefined ? "nothing" : describeJson(value)}`);
  }
  return value;
};

const expectString = (value: JsonValue | undefined, path: string): string => {
  if (typeof value !== "string") {
    throw new ManifestError(path, `expected a string, got ${value === undefined ? "nothing" : describeJson(value)}`);
  }
  return value;
};

const jsonToPrimitive = (kind: ValueKind, value: JsonValue, path: string): PrimitiveValue => {
  const codec = primitiveCodec(kind);
  let primitive: PrimitiveValue;

  switch (kind) {
    case ValueKind.U64:
    case ValueKind.I64: {
      const text = value instanceof JsonNumber || typeof value === "string" ? String(value) : "";
      if (!DECIMAL_INTEGER.test(text)) {
        throw new ManifestError(path, `expected an integer or a decimal string for ${codec.name}`);
      }
      primitive = BigInt(text);
      break;
    }
    case ValueKind.STR:
      primitive = expectString(value, path);
      break;
    case ValueKind.BLOB: {
      const hex = expectString(value, path);
      if (!HEX_BYTES.test(hex)) {
        throw new ManifestError(path, "expected a hex string with an even number of digits");
      }
      primitive = Buffer.from(hex, "hex");
      break;
    }
    case ValueKind.F32:
      if (typeof value === "string" && Object.hasOwn(NON_FINITE, value)) {
        primitive = NON_FINITE[value];
        break;
      }
    // falls through
    default:
      if (!(value instanceof JsonNumber)) {
        throw new ManifestError(path, `expected a number for ${codec.name}, got ${describeJson(value)}`);
      }
      primitive = Number(value.text);
  }

  if (!codec.accepts(primitive)) {
    throw new ManifestError(path, `${String(value)} is out of range for ${codec.name}`);
  }
  return primitive;
};

const primitiveToJson = (value: PrimitiveValue): JsonValue => {
  if (typeof value === "string") {
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.length).toString("hex");
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return new JsonNumber(String(value));
};

const readColumn = (json: JsonValue, path: string): { column: ColumnDescriptor; value?: JsonValue } => {
  const object = expectObject(json, path);
  const name = expectString(getJsonProperty(object, "name"), `${path}.name`);
  const kindName = expectString(getJsonProperty(object, "kind"), `${path}.kind`);
  const storageName = expectString(getJsonProperty(object, "storage"), `${path}.storage`);

  const kind = parseValueKind(kindName);
  if (kind === undefined) {
    throw new ManifestError(`${path}.kind`, `unknown kind "${kindName}"`);
  }
  const storage = parseStorageKind(storageName);
  if (storage === undefined) {
    throw new ManifestError(`${path}.storage`, `unknown storage "${storageName}"`);
  }

  const value = getJsonProperty(object, "value");
  if (storage === StorageKind.Constant && value === undefined) {
    throw new ManifestError(`${path}.value`, "constant columns need a value");
  }
  if (storage !== StorageKind.Constant && value !== undefined) {
    throw new ManifestError(`${path}.value`, `${storageName} columns carry no value`);
  }
  return { column: { name, storage, kind }, value };
};

/** Converts a parsed manifest document into a table ready for writeDynamicTable. */
export const manifestToTable = (json: JsonValue): DynamicTable => {
  const root = expectObject(json, "$");
  const tableName = expectString(getJsonProperty(root, "tableName"), "$.tableName");
  const columnsJson = expectArray(getJsonProperty(root, "columns"), "$.columns");
  const rowsJson = getJsonProperty(root, "rows");

  const columns: ColumnDescriptor[] = [];
  const constants: Record<string, PrimitiveValue | null> = {};
  const names = new Set<string>();

  columnsJson.forEach((entry, index) => {
    const path = `$.columns[${index}]`;
    const { column, value } = readColumn(entry, path);
    if (names.has(column.name)) {
      throw new ManifestError(`${path}.name`, `duplicate column "${column.name}"`);
    }
    names.add(column.name);
    columns.push(column);
    if (column.storage === StorageKind.Constant && value !== undefined) {
      setColumnValue(constants, column.name, jsonToPrimitive(column.kind, value, `${path}.value`));
    } else if (column.storage === StorageKind.Zero) {
      setColumnValue(constants, column.name, null);
    }
  });

  const rowed = columns.filter((column) => column.storage === StorageKind.Rowed);
  const rowedNames = new Set(rowed.map((column) => column.name));
  const rowEntries: JsonValue[] = rowsJson === undefined ? [] : expectArray(rowsJson, "$.rows");
  const rows = rowEntries.map((entry, index) => {
    const path = `$.rows[${index}]`;
    const object = expectObject(entry, path);
    for (const key of Object.keys(object)) {
      if (!rowedNames.has(key)) {
        throw new ManifestError(`${path}.${key}`, "not a rowed column");
      }
    }
    const row: Record<string, PrimitiveValue> = {};
    for (const column of rowed) {
      const value = getJsonProperty(object, column.name);
      if (value === undefined) {
        throw new ManifestError(`${path}.${column.name}`, "missing value");
      }
      setColumnValue(row, column.name, jsonToPrimitive(column.kind, value, `${path}.${column.name}`));
    }
    return row;
  });

  return { tableName, columns, constants, rows };
};

export const tableToManifest = (table: DynamicTable): JsonValue => {
  const columns: JsonValue[] = table.columns.map((column) => {
    const entry: JsonObject = {
      name: column.name,
      kind: valueKindName(column.kind),
      storage: storageKindName(column.storage),
    };
    const value = getColumnValue(table.constants, column.name);
    if (column.storage === StorageKind.Constant && value !== undefined && value !== null) {
      setJsonProperty(entry, "value", primitiveToJson(value));
    }
    return entry;
  });

  const rowed = table.columns.filter((column) => column.storage === StorageKind.Rowed);
  const rows: JsonValue[] = table.rows.map((row, index) => {
    const entry: JsonObject = {};
    for (const column of rowed) {
      const value = getColumnValue(row, column.name);
      if (value === undefined) {
        throw new WriteConsistencyError(
          "MissingRowValue",
          `row ${index} has no value for column "${column.name}"`,
          column.name
        );
      }
      setJsonProperty(entry, column.name, primitiveToJson(value));
    }
    return entry;
  });

  return { tableName: table.tableName, columns, rows };
};

export const stringifyManifest = (table: DynamicTable): string => `${stringifyJson(tableToManifest(table))}\n`;

/** Objects and arrays a well-formed manifest nests: root, columns or rows, entry. */
const MANIFEST_MAX_DEPTH = 3;

export const readManifest = async (readable: Readable): Promise<DynamicTable> => {
  const assembler = new JsonAssembler();
  try {
    await parseJsonStream(readable, assembler, { maxDepth: MANIFEST_MAX_DEPTH });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ManifestError("$", error.message);
    }
    throw error;
  }
  return manifestToTable(assembler.result());
};
