import { PassThrough } from "node:stream";
import { once } from "node:events";
import { describe, expect, it } from "vitest";
import { blobTable, demoTable, demoWriter } from "../test/fixtures.js";
import { ValueConversionError } from "./errors.js";
import { StorageKind, ValueKind } from "./format.js";
import { TableReader } from "./reader.js";
import { blob, str } from "./value.js";
import { TableWriter } from "./writer.js";

describe("TableWriter", () => {
  it("lays out a table exactly as the format describes", () => {
    expect(demoWriter().end(4, 3).toString("hex")).toBe(demoTable().toString("hex"));
  });

  it("reports statistics about the regions it built", () => {
    expect(demoWriter().getStats()).toEqual({
      fieldCount: 2,
      columnBytes: 14,
      rowBytes: 12,
      strings: { uniqueCount: 5, poolBytes: 26 },
      blobBytes: 0,
    });
  });

  it("stores each distinct string once", () => {
    const writer = new TableWriter("T");
    writer.pushConstantColumn("A", str, "x");
    writer.pushConstantColumn("B", str, "x");
    const table = writer.end(0, 0);
    const reader = TableReader.fromBuffer(table);

    expect(writer.getStats().strings).toEqual({ uniqueCount: 5, poolBytes: 15 });
    expect(reader.readColumnConstant("A", str)).toBe("x");
    expect(reader.readColumnConstant("B", str)).toBe("x");
  });

  it("keeps the table name at pool offset 7 even when it is <NULL>", () => {
    const table = new TableWriter("<NULL>").end(0, 0);

    expect(table.readUInt32BE(20)).toBe(7);
    expect(TableReader.fromBuffer(table).tableName).toBe("<NULL>");
  });

  it("pads the string pool so blobs start on an 8-byte boundary", () => {
    const table = blobTable();

    expect(table.readUInt32BE(16)).toBe(56);
    expect(table.length).toBe(67);
    expect(table.subarray(59, 64)).toEqual(Buffer.alloc(5));
    expect(table.subarray(64)).toEqual(Buffer.from([1, 2, 3]));
  });

  it("adds no padding when the pool already ends on a boundary", () => {
    const writer = new TableWriter("B");
    writer.pushConstantColumn("D", blob, Buffer.from([1, 2, 3]));
    const table = writer.end(0, 0);

    expect(table.readUInt32BE(12)).toBe(37);
    expect(table.readUInt32BE(16)).toBe(48);
    expect(table.length).toBe(59);
  });

  it("pushes columns described only by their kinds", () => {
    const writer = new TableWriter("K");
    writer.pushColumn({ name: "Count", storage: StorageKind.Constant, kind: ValueKind.U16 }, 513);
    writer.pushColumn({ name: "Unused", storage: StorageKind.Zero, kind: ValueKind.F32 });
    const reader = TableReader.fromBuffer(writer.end(0, 0));

    expect(reader.readColumnDescriptor()).toEqual({
      name: "Count",
      storage: StorageKind.Constant,
      kind: ValueKind.U16,
    });
    expect(reader.readPrimitive(ValueKind.U16, false)).toBe(513);
    expect(reader.readColumnDescriptor().storage).toBe(StorageKind.Zero);
  });

  it("requires a value for constant columns pushed by descriptor", () => {
    const writer = new TableWriter("K");

    expect(() => writer.pushColumn({ name: "Count", storage: StorageKind.Constant, kind: ValueKind.U8 })).toThrow(
      'failed to convert undefined to u8: constant column "Count" has no value'
    );
  });

  it("refuses table names containing NUL", () => {
    expect(() => new TableWriter("a\0b")).toThrow(ValueConversionError);
  });

  it("streams the same bytes it would return", async () => {
    const stream = new PassThrough();
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));

    await demoWriter().endTo(stream, 4, 3);
    stream.end();
    await once(stream, "finish");

    expect(Buffer.concat(chunks)).toEqual(demoTable());
  });
});
