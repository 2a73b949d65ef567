import { TableWriter } from "../binary/writer.js";
import { blob, str, u32 } from "../binary/value.js";

/**
 * Table "Demo": constant string Comment = "hi", rowed u32 Id = 1, 2, 3.
 * Written out byte by byte so reader tests do not depend on the writer.
 */
export const demoTable = (): Buffer =>
  Buffer.concat([
    Buffer.from(
      "40555446" + // @UTF
        "00000050" + // table size 80
        "00000026" + // row offset 38
        "00000032" + // string offset 50
        "00000050" + // blob offset 80
        "00000007" + // table name
        "0002" + // field count
        "0004" + // row size
        "00000003" + // row count
        "3a" + "0000000c" + "00000014" + // Comment: constant string "hi"
        "54" + "00000017" + // Id: rowed u32
        "00000001" + "00000002" + "00000003",
      "hex"
    ),
    Buffer.from("<NULL>\0Demo\0Comment\0hi\0Id\0", "latin1"),
    Buffer.alloc(4),
  ]);

/** Byte offset of the Comment column's string reference in demoTable(). */
export const DEMO_COMMENT_VALUE_OFFSET = 37;

/** Table "B" holding one constant blob column "Data" = 01 02 03. */
export const blobTable = (): Buffer => {
  const writer = new TableWriter("B");
  writer.pushConstantColumn("Data", blob, Buffer.from([1, 2, 3]));
  return writer.end(0, 0);
};

export const demoWriter = (): TableWriter => {
  const writer = new TableWriter("Demo");
  writer.pushConstantColumn("Comment", str, "hi");
  writer.pushRowedColumn("Id", u32);
  for (const id of [1, 2, 3]) {
    writer.writeRawValue(u32, true, id);
  }
  return writer;
};
