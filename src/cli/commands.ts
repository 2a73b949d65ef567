import { finished } from "node:stream/promises";
import { Schema } from "../binary/schema.js";
import { TableWriter } from "../binary/writer.js";
import { createReadStream, createWriteStream, readStreamToBuffer, writeChunks } from "../io/streams.js";
import { Packet } from "../packet/packet.js";
import type { TableCodec } from "../table/codec.js";
import { dynamicTableCodec, readDynamicTable, writeDynamicTable } from "../table/dynamic.js";
import { readManifest, stringifyManifest } from "../table/manifest.js";
import { storageKindName, valueKindName } from "../binary/format.js";

export type CommandOptions = {
  /** Four-character tag of the packet envelope wrapping the table. */
  packet?: string;
  signal?: AbortSignal;
};

export type TableSource = {
  table: Buffer;
  /** Undefined when the file is a bare table. */
  encrypted?: boolean;
};

// Packets are opened without decoding the table so schema and dump see the raw bytes.
const rawTableCodec: TableCodec<Buffer> = {
  create: () => new TableWriter("").end(0, 0),
  read: (input) => Buffer.from(input),
  write: (table) => table,
};

const writeFile = async (path: string, contents: Buffer, signal?: AbortSignal): Promise<void> => {
  const stream = createWriteStream(path, signal);
  await writeChunks(stream, [contents]);
  stream.end();
  await finished(stream);
};

export const loadTable = async (path: string, options: CommandOptions = {}): Promise<TableSource> => {
  const bytes = await readStreamToBuffer(createReadStream(path, options.signal));
  if (options.packet === undefined) {
    return { table: bytes };
  }
  const packet = Packet.read(bytes, options.packet, rawTableCodec);
  return { table: packet.table, encrypted: packet.isEncrypted() };
};

export type SchemaResult = {
  schema: Schema;
  encrypted?: boolean;
};

export const runSchema = async (path: string, options: CommandOptions = {}): Promise<SchemaResult> => {
  const { table, encrypted } = await loadTable(path, options);
  return { schema: Schema.read(table), encrypted };
};

export const formatSchema = (schema: Schema): string[] => {
  const width = Math.max(0, ...schema.columns.map((column) => column.name.length));
  return [
    `Table: ${schema.tableName}`,
    `Columns: ${schema.columns.length}`,
    ...schema.columns.map(
      (column) =>
        `  ${column.name.padEnd(width)}  ${valueKindName(column.kind).padEnd(6)}  ${storageKindName(column.storage)}`
    ),
  ];
};

export type DumpOptions = CommandOptions & { output?: string };

export type DumpResult = {
  manifest: string;
  rowCount: number;
  encrypted?: boolean;
};

export const runDump = async (path: string, options: DumpOptions = {}): Promise<DumpResult> => {
  const { table, encrypted } = await loadTable(path, options);
  const decoded = readDynamicTable(table);
  const manifest = stringifyManifest(decoded);
  if (options.output !== undefined) {
    await writeFile(options.output, Buffer.from(manifest, "utf8"), options.signal);
  }
  return { manifest, rowCount: decoded.rows.length, encrypted };
};

export type BuildOptions = CommandOptions & { encrypt?: boolean };

export type BuildResult = {
  tableName: string;
  columnCount: number;
  rowCount: number;
  byteLength: number;
  encrypted: boolean;
};

export const runBuild = async (
  manifestPath: string,
  outputPath: string,
  options: BuildOptions = {}
): Promise<BuildResult> => {
  if (options.encrypt && options.packet === undefined) {
    throw new Error("--encrypt needs --packet: only packet payloads can be masked");
  }
  const table = await readManifest(createReadStream(manifestPath, options.signal));

  let output: Buffer;
  if (options.packet === undefined) {
    output = writeDynamicTable(table);
  } else {
    const packet = Packet.fromTable(table, options.packet, dynamicTableCodec(table.tableName));
    if (options.encrypt) {
      packet.enableEncryption();
    }
    output = packet.write();
  }

  await writeFile(outputPath, output, options.signal);
  return {
    tableName: table.tableName,
    columnCount: table.columns.length,
    rowCount: table.rows.length,
    byteLength: output.length,
    encrypted: options.encrypt === true,
  };
};
