import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { CipherError, StructuralError, TruncatedInputError } from "../binary/errors.js";
import { str, u32 } from "../binary/value.js";
import { WriteContext } from "../binary/writer.js";
import { constant, defineTable, rowed } from "../table/definition.js";
import { demoTable } from "../test/fixtures.js";
import { maskBuffer } from "./cipher.js";
import { Packet } from "./packet.js";

const Demo = defineTable("Demo", {
  comment: constant(str),
  id: rowed(u32),
});

const demoContents = () => ({
  constants: { comment: "hi" },
  rows: [{ id: 1 }, { id: 2 }, { id: 3 }],
  writeContext: new WriteContext(),
});

const envelope = (tag: string, unknown: number, payload: Buffer, declared = payload.length): Buffer => {
  const header = Buffer.alloc(16);
  header.write(tag, 0, "latin1");
  header.writeUInt32LE(unknown, 4);
  header.writeBigUInt64LE(BigInt(declared), 8);
  return Buffer.concat([header, payload]);
};

const errorOf = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("Packet", () => {
  it("wraps a plain table in a tagged envelope", () => {
    const bytes = Packet.fromTable(demoContents(), "TAB ", Demo).write();

    expect(bytes.subarray(0, 4).toString("latin1")).toBe("TAB ");
    expect(bytes.readUInt32LE(4)).toBe(0);
    expect(bytes.readBigUInt64LE(8)).toBe(88n);
    expect(bytes.subarray(16)).toEqual(demoTable());
  });

  it("masks the payload when encryption is enabled", () => {
    const packet = Packet.fromTable(demoContents(), "TAB ", Demo);
    packet.enableEncryption();
    const bytes = packet.write();

    expect(bytes.readBigUInt64LE(8)).toBe(88n);
    expect(bytes.subarray(16, 20).toString("hex")).toBe("1f9ef3f5");
    expect(bytes.subarray(16)).toEqual(maskBuffer(demoTable()));
  });

  it("reads plain and encrypted packets alike", () => {
    const plain = Packet.read(envelope("TAB ", 0, demoTable()), "TAB ", Demo);
    const encrypted = Packet.read(envelope("TAB ", 0, maskBuffer(demoTable())), "TAB ", Demo);

    expect(plain.isEncrypted()).toBe(false);
    expect(encrypted.isEncrypted()).toBe(true);
    expect(encrypted.table.constants).toEqual({ comment: "hi" });
    expect(encrypted.table.rows).toEqual(plain.table.rows);
  });

  it("keeps the encryption state and unknown value across a rewrite", () => {
    const original = envelope("TAB ", 0xdeadbeef, maskBuffer(demoTable()));
    const packet = Packet.read(original, "TAB ", Demo);

    expect(packet.unknownValue).toBe(0xdeadbeef);
    expect(packet.write()).toEqual(original);

    packet.disableEncryption();
    expect(packet.write()).toEqual(envelope("TAB ", 0xdeadbeef, demoTable()));
  });

  it("creates an empty table", () => {
    const packet = Packet.create("TAB ", Demo);

    expect(packet.table.constants).toEqual({ comment: "" });
    expect(packet.table.rows).toEqual([]);
    expect(packet.isEncrypted()).toBe(false);
  });

  it("rejects another packet tag", () => {
    expect(() => Packet.read(envelope("TAB ", 0, demoTable()), "HDR ", Demo)).toThrow(
      'wrong table schema: packet tag "TAB " (expected "HDR ")'
    );
  });

  it("rejects tags that are not four single-byte characters", () => {
    expect(() => Packet.create("TABLE", Demo)).toThrow(RangeError);
  });

  it("rejects payloads too short for a table", () => {
    const error = errorOf(() => Packet.read(envelope("TAB ", 0, Buffer.alloc(16)), "TAB ", Demo));

    expect(error).toBeInstanceOf(StructuralError);
    expect(error).toMatchObject({
      code: "MalformedHeader",
      message: "malformed header: packet payload of 16 bytes cannot hold a UTF table",
    });
  });

  it("reports a payload cut short", () => {
    const truncated = envelope("TAB ", 0, demoTable(), 100);

    expect(() => Packet.read(truncated, "TAB ", Demo)).toThrow("reached end of file early (at UTF table)");
    expect(() => Packet.read(Buffer.from("TAB "), "TAB ", Demo)).toThrow(TruncatedInputError);
  });

  it("enforces the payload size limit", () => {
    const error = errorOf(() =>
      Packet.read(envelope("TAB ", 0, demoTable()), "TAB ", Demo, { maxPayloadBytes: 64 })
    );

    expect(error).toBeInstanceOf(StructuralError);
    expect(error).toMatchObject({
      code: "AllocationLimit",
      message: "packet payload of 88 bytes exceeds the 64 byte limit",
    });
  });

  it("rejects payloads that are neither plain nor masked", () => {
    const error = errorOf(() => Packet.read(envelope("TAB ", 0, Buffer.alloc(40, 0x11)), "TAB ", Demo));

    expect(error).toBeInstanceOf(CipherError);
    expect(error).toMatchObject({ code: "DecryptionError" });
  });

  it("reads from a stream", async () => {
    const packet = await Packet.fromStream(
      Readable.from([envelope("TAB ", 7, maskBuffer(demoTable()))]),
      "TAB ",
      Demo
    );

    expect(packet.unknownValue).toBe(7);
    expect(packet.table.rows).toHaveLength(3);
  });
});
