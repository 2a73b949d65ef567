import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { SchemaMismatchError } from "../binary/errors.js";
import { StorageKind, ValueKind } from "../binary/format.js";
import { demoTable } from "../test/fixtures.js";
import { u32, u8 } from "../binary/value.js";
import { TableWriter } from "../binary/writer.js";
import { getColumnValue, readDynamicTable, writeDynamicTable } from "./dynamic.js";
import { ManifestError, readManifest, stringifyManifest, tableToManifest } from "./manifest.js";

const fromJson = (text: string) => readManifest(Readable.from([text]));

const failureOf = async (text: string): Promise<unknown> => {
  try {
    await fromJson(text);
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("JSON manifests", () => {
  it("prints a table as an indented manifest", () => {
    expect(stringifyManifest(readDynamicTable(demoTable()))).toBe(
      [
        "{",
        '  "tableName": "Demo",',
        '  "columns": [',
        "    {",
        '      "name": "Comment",',
        '      "kind": "string",',
        '      "storage": "constant",',
        '      "value": "hi"',
        "    },",
        "    {",
        '      "name": "Id",',
        '      "kind": "u32",',
        '      "storage": "rowed"',
        "    }",
        "  ],",
        '  "rows": [',
        "    {",
        '      "Id": 1',
        "    },",
        "    {",
        '      "Id": 2',
        "    },",
        "    {",
        '      "Id": 3',
        "    }",
        "  ]",
        "}",
        "",
      ].join("\n")
    );
  });

  it("builds the Demo table from its manifest", async () => {
    const table = await fromJson(stringifyManifest(readDynamicTable(demoTable())));

    expect(writeDynamicTable(table)).toEqual(demoTable());
  });

  it("keeps 64-bit integers exact and decodes hex blobs", async () => {
    const table = await fromJson(
      JSON.stringify({
        tableName: "Wide",
        columns: [
          { name: "Max", kind: "u64", storage: "constant", value: "18446744073709551615" },
          { name: "Low", kind: "i64", storage: "rowed" },
          { name: "Hash", kind: "blob", storage: "rowed" },
          { name: "Gone", kind: "f32", storage: "zero" },
        ],
        rows: [{ Low: -5, Hash: "00ff" }],
      }).replace('"18446744073709551615"', "18446744073709551615")
    );

    expect(table.columns[3]).toEqual({ name: "Gone", storage: StorageKind.Zero, kind: ValueKind.F32 });
    expect(table.constants).toEqual({ Max: 18446744073709551615n, Gone: null });
    expect(table.rows).toEqual([{ Low: -5n, Hash: Buffer.from([0x00, 0xff]) }]);
  });

  it("writes 64-bit integers and blobs back without loss", () => {
    const manifest = stringifyManifest({
      tableName: "Wide",
      columns: [
        { name: "Max", storage: StorageKind.Constant, kind: ValueKind.U64 },
        { name: "Hash", storage: StorageKind.Rowed, kind: ValueKind.BLOB },
      ],
      constants: { Max: 18446744073709551615n },
      rows: [{ Hash: Buffer.from([0xca, 0xfe]) }],
    });

    expect(manifest).toContain('"value": 18446744073709551615');
    expect(manifest).toContain('"Hash": "cafe"');
  });

  it("omits values for Zero columns", () => {
    const json = tableToManifest({
      tableName: "Z",
      columns: [{ name: "Off", storage: StorageKind.Zero, kind: ValueKind.U8 }],
      constants: { Off: null },
      rows: [],
    });

    expect(json).toEqual({
      tableName: "Z",
      columns: [{ name: "Off", kind: "u8", storage: "zero" }],
      rows: [],
    });
  });

  it("points at unknown kinds", async () => {
    const error = await failureOf('{"tableName":"T","columns":[{"name":"A","kind":"u128","storage":"rowed"}]}');

    expect(error).toBeInstanceOf(ManifestError);
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({
      code: "InvalidManifest",
      path: "$.columns[0].kind",
      message: 'invalid manifest at $.columns[0].kind: unknown kind "u128"',
    });
  });

  it("rejects values outside the column kind", async () => {
    const error = await failureOf(
      '{"tableName":"T","columns":[{"name":"Id","kind":"u8","storage":"rowed"}],"rows":[{"Id":300}]}'
    );

    expect(error).toMatchObject({ message: "invalid manifest at $.rows[0].Id: 300 is out of range for u8" });
  });

  it("rejects rows missing a column or naming an unknown one", async () => {
    const columns = '"columns":[{"name":"Id","kind":"u8","storage":"rowed"}]';

    expect(await failureOf(`{"tableName":"T",${columns},"rows":[{}]}`)).toMatchObject({
      message: "invalid manifest at $.rows[0].Id: missing value",
    });
    expect(await failureOf(`{"tableName":"T",${columns},"rows":[{"Id":1,"Extra":2}]}`)).toMatchObject({
      message: "invalid manifest at $.rows[0].Extra: not a rowed column",
    });
  });

  it("requires a value exactly for constant columns", async () => {
    expect(
      await failureOf('{"tableName":"T","columns":[{"name":"C","kind":"string","storage":"constant"}]}')
    ).toMatchObject({ message: "invalid manifest at $.columns[0].value: constant columns need a value" });
    expect(
      await failureOf('{"tableName":"T","columns":[{"name":"R","kind":"u8","storage":"rowed","value":1}]}')
    ).toMatchObject({ message: "invalid manifest at $.columns[0].value: rowed columns carry no value" });
  });

  it("accepts column names such as __proto__ and constructor", async () => {
    const table = await fromJson(
      '{"tableName":"Odd","columns":[' +
        '{"name":"__proto__","kind":"u32","storage":"constant","value":5},' +
        '{"name":"constructor","kind":"u8","storage":"rowed"}],' +
        '"rows":[{"constructor":7}]}'
    );
    const writer = new TableWriter("Odd");
    writer.pushConstantColumn("__proto__", u32, 5);
    writer.pushRowedColumn("constructor", u8);
    writer.writeRawValue(u8, true, 7);

    expect(getColumnValue(table.constants, "__proto__")).toBe(5);
    expect(getColumnValue(table.rows[0], "constructor")).toBe(7);
    expect(writeDynamicTable(table).toString("hex")).toBe(writer.end(1, 1).toString("hex"));
    expect(JSON.parse(stringifyManifest(table))).toEqual(
      JSON.parse(
        '{"tableName":"Odd","columns":[' +
          '{"name":"__proto__","kind":"u32","storage":"constant","value":5},' +
          '{"name":"constructor","kind":"u8","storage":"rowed"}],' +
          '"rows":[{"constructor":7}]}'
      )
    );
  });

  it("does not read inherited members as row values", async () => {
    expect(
      await failureOf(
        '{"tableName":"T","columns":[{"name":"constructor","kind":"u8","storage":"rowed"}],"rows":[{}]}'
      )
    ).toMatchObject({ message: "invalid manifest at $.rows[0].constructor: missing value" });
  });

  it("rejects values nested deeper than a manifest goes", async () => {
    const error = await failureOf(
      '{"tableName":"T","columns":[{"name":"A","kind":"u8","storage":"constant","value":[1]}]}'
    );

    expect(error).toBeInstanceOf(ManifestError);
    expect(error).toMatchObject({ path: "$", message: "invalid manifest at $: JSON nesting exceeds 3 levels" });
  });

  it("rejects a document that is not an object", async () => {
    expect(await failureOf("[1, 2]")).toMatchObject({
      message: "invalid manifest at $: expected an object, got array",
    });
  });
});
