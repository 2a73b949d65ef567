import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { demoTable } from "../test/fixtures.js";
import { StorageKind, ValueKind } from "./format.js";
import { Schema, readSchema } from "./schema.js";
import { blob, f32, i16, i32, i64, i8, str, u16, u32, u64, u8 } from "./value.js";
import { TableWriter } from "./writer.js";

const everyKindTable = (): Buffer => {
  const writer = new TableWriter("Kinds");
  writer.pushConstantColumn("A", u8, 7);
  writer.pushConstantColumn("B", i8, -1);
  writer.pushConstantColumn("C", u16, 2);
  writer.pushConstantColumn("D", i16, -2);
  writer.pushConstantColumn("E", u32, 4);
  writer.pushConstantColumn("F", i32, -4);
  writer.pushConstantColumn("G", u64, 8n);
  writer.pushConstantColumn("H", i64, -8n);
  writer.pushConstantColumn("I", f32, 0.5);
  writer.pushConstantColumn("J", str, "s");
  writer.pushConstantColumn("K", blob, Buffer.from([1]));
  writer.pushConstantColumnOpt("Missing", u16, null);
  writer.pushRowedColumn("Row", u8);
  writer.writeRawValue(u8, true, 9);
  return writer.end(1, 1);
};

describe("Schema", () => {
  it("lists columns without decoding values", () => {
    const schema = readSchema(demoTable());

    expect(schema.tableName).toBe("Demo");
    expect(schema.columns).toEqual([
      { name: "Comment", storage: StorageKind.Constant, kind: ValueKind.STR },
      { name: "Id", storage: StorageKind.Rowed, kind: ValueKind.U32 },
    ]);
  });

  it("skips constant values of every width", () => {
    const schema = Schema.read(everyKindTable());

    expect(schema.columns.map((column) => column.name)).toEqual([
      "A",
      "B",
      "C",
      "D",
      "E",
      "F",
      "G",
      "H",
      "I",
      "J",
      "K",
      "Missing",
      "Row",
    ]);
    expect(schema.columns.map((column) => column.kind)).toEqual([
      ValueKind.U8,
      ValueKind.I8,
      ValueKind.U16,
      ValueKind.I16,
      ValueKind.U32,
      ValueKind.I32,
      ValueKind.U64,
      ValueKind.I64,
      ValueKind.F32,
      ValueKind.STR,
      ValueKind.BLOB,
      ValueKind.U16,
      ValueKind.U8,
    ]);
    expect(schema.getColumn("Missing")).toEqual({
      name: "Missing",
      storage: StorageKind.Zero,
      kind: ValueKind.U16,
    });
    expect(schema.getColumn("Row")?.storage).toBe(StorageKind.Rowed);
  });

  it("answers column lookups", () => {
    const schema = readSchema(demoTable());

    expect(schema.hasColumn("Id")).toBe(true);
    expect(schema.hasColumn("Name")).toBe(false);
    expect(schema.getColumn("Name")).toBeUndefined();
  });

  it("reads from a stream", async () => {
    const schema = await Schema.fromStream(Readable.from([demoTable()]));

    expect(schema.tableName).toBe("Demo");
  });
});
