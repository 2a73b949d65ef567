import { describe, expect, it } from "vitest";
import { demoTable } from "../test/fixtures.js";
import { DataIntegrityError, StructuralError, TruncatedInputError } from "./errors.js";
import { ValueKind } from "./format.js";
import { TableReader } from "./reader.js";

const withHeaderField = (offset: number, value: number): Buffer => {
  const table = demoTable();
  table.writeUInt32BE(value, offset);
  return table;
};

const errorOf = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("TableReader on malformed input", () => {
  it("stops at a truncated primary header", () => {
    const error = errorOf(() => TableReader.fromBuffer(Buffer.from("@UTF")));

    expect(error).toBeInstanceOf(TruncatedInputError);
    expect(error).toMatchObject({ code: "EOF", message: "reached end of file early (at @UTF header)" });
  });

  it("rejects input without the @UTF magic", () => {
    const table = demoTable();
    table.write("XUTF", 0, "latin1");

    expect(() => TableReader.fromBuffer(table)).toThrow("malformed header: missing @UTF magic");
  });

  it("treats a table size smaller than the secondary header as truncation", () => {
    expect(() => TableReader.fromBuffer(withHeaderField(4, 16))).toThrow(TruncatedInputError);
  });

  it("rejects a row offset inside the secondary header", () => {
    const error = errorOf(() => TableReader.fromBuffer(withHeaderField(8, 20)));

    expect(error).toBeInstanceOf(StructuralError);
    expect(error).toMatchObject({ code: "MalformedHeader", message: "malformed header" });
  });

  it("rejects a string region that starts before the rows", () => {
    expect(() => TableReader.fromBuffer(withHeaderField(12, 30))).toThrow("malformed header");
  });

  it("rejects a blob region past the end of the table", () => {
    expect(() => TableReader.fromBuffer(withHeaderField(16, 96))).toThrow("malformed header");
  });

  it("rejects a row region that disagrees with rowSize x rowCount", () => {
    expect(() => TableReader.fromBuffer(withHeaderField(28, 4))).toThrow("malformed header");
  });

  it("rejects a table name that does not start a pool string", () => {
    expect(() => TableReader.fromBuffer(withHeaderField(20, 8))).toThrow(
      "malformed header: table name is not in the string pool"
    );
  });

  it("names the region that was cut short", () => {
    const table = demoTable();

    expect(() => TableReader.fromBuffer(table.subarray(0, 32))).toThrow(
      "reached end of file early (at UTF column data)"
    );
    expect(() => TableReader.fromBuffer(table.subarray(0, 50))).toThrow(
      "reached end of file early (at UTF row data)"
    );
    expect(() => TableReader.fromBuffer(table.subarray(0, 60))).toThrow(
      "reached end of file early (at UTF string data)"
    );
  });

  it("rejects strings that are not valid UTF-8", () => {
    const table = demoTable();
    // "hi" sits 20 bytes into the pool, which starts at byte 58
    table[78] = 0xff;
    const error = errorOf(() => TableReader.fromBuffer(table));

    expect(error).toBeInstanceOf(DataIntegrityError);
    expect(error).toMatchObject({
      code: "StringMalformed",
      message: "error when decoding utf8 string at pool offset 20",
    });
  });

  it("rejects unknown kind and storage nibbles", () => {
    const badKind = demoTable();
    badKind[32] = 0x3c;
    expect(() => TableReader.fromBuffer(badKind).readColumnDescriptor()).toThrow(
      "invalid column type flag: 0x0c"
    );

    const badStorage = demoTable();
    badStorage[32] = 0x2a;
    expect(() => TableReader.fromBuffer(badStorage).readColumnDescriptor()).toThrow(
      "invalid column storage flag: 0x20"
    );
  });

  it("stops when a column record runs past the column region", () => {
    const table = demoTable();
    // Claim the Id column holds a constant u32 that the region has no room for.
    table[41] = 0x34;
    const reader = TableReader.fromBuffer(table);
    reader.readColumnDescriptor();
    reader.readPrimitive(ValueKind.STR, false);
    reader.readColumnDescriptor();

    expect(() => reader.skipColumnValue(ValueKind.U32)).toThrow("reached end of file early (at reading u32 value)");
  });
});
