/**
 * UTF table binary format
 *
 * Layout (all integers are big-endian):
 *
 *   [Primary header]
 *     - magic: 4 bytes ("@UTF")
 *     - tableSize: u32 (bytes following the primary header)
 *
 *   [Secondary header] (offsets below are relative to its first byte)
 *     - rowOffset: u32
 *     - stringOffset: u32
 *     - blobOffset: u32
 *     - tableName: u32 (string pool reference)
 *     - fieldCount: u16
 *     - rowSize: u16
 *     - rowCount: u32
 *
 *   [Column area]
 *     - flag: u8 (storage << 4 | kind)
 *     - name: u32 (string pool reference)
 *     - value (constant columns only, width per kind)
 *
 *   [Row area]       rowCount records of rowSize bytes
 *   [String pool]    NUL-terminated UTF-8, "<NULL>" first
 *   [Blob pool]      raw bytes, 8-byte aligned start
 */

export const UTF_MAGIC = Buffer.from("@UTF");

export const PRIMARY_HEADER_LENGTH = 8;
export const SECONDARY_HEADER_LENGTH = 24;

export const NULL_STRING = "<NULL>";
/** `<NULL>\0` always occupies the first seven pool bytes. */
export const TABLE_NAME_STRING_OFFSET = 7;

export const BLOB_ALIGNMENT = 8;

export enum ValueKind {
  U8 = 0x0,
  I8 = 0x1,
  U16 = 0x2,
  I16 = 0x3,
  U32 = 0x4,
  I32 = 0x5,
  U64 = 0x6,
  I64 = 0x7,
  F32 = 0x8,
  STR = 0xa,
  BLOB = 0xb,
}

export enum StorageKind {
  Zero = 0x1,
  Constant = 0x3,
  Rowed = 0x5,
}

export type ColumnDescriptor = {
  name: string;
  storage: StorageKind;
  kind: ValueKind;
};

export const VALUE_KINDS: readonly ValueKind[] = [
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
];

const VALUE_KIND_NAMES: Readonly<Record<ValueKind, string>> = {
  [ValueKind.U8]: "u8",
  [ValueKind.I8]: "i8",
  [ValueKind.U16]: "u16",
  [ValueKind.I16]: "i16",
  [ValueKind.U32]: "u32",
  [ValueKind.I32]: "i32",
  [ValueKind.U64]: "u64",
  [ValueKind.I64]: "i64",
  [ValueKind.F32]: "f32",
  [ValueKind.STR]: "string",
  [ValueKind.BLOB]: "blob",
};

const STORAGE_KIND_NAMES: Readonly<Record<StorageKind, string>> = {
  [StorageKind.Zero]: "zero",
  [StorageKind.Constant]: "constant",
  [StorageKind.Rowed]: "rowed",
};

export const isValueKind = (nibble: number): nibble is ValueKind =>
  nibble <= ValueKind.F32 || nibble === ValueKind.STR || nibble === ValueKind.BLOB;

export const isStorageKind = (nibble: number): nibble is StorageKind =>
  nibble === StorageKind.Zero ||
  nibble === StorageKind.Constant ||
  nibble === StorageKind.Rowed;

export const valueKindName = (kind: ValueKind): string => VALUE_KIND_NAMES[kind];

export const storageKindName = (storage: StorageKind): string =>
  STORAGE_KIND_NAMES[storage];

export const parseValueKind = (name: string): ValueKind | undefined =>
  VALUE_KINDS.find((kind) => VALUE_KIND_NAMES[kind] === name);

export const parseStorageKind = (name: string): StorageKind | undefined => {
  switch (name) {
    case "zero":
      return StorageKind.Zero;
    case "constant":
      return StorageKind.Constant;
    case "rowed":
      return StorageKind.Rowed;
    default:
      return undefined;
  }
};

export const columnFlag = (storage: StorageKind, kind: ValueKind): number =>
  ((storage << 4) | kind) & 0xff;

export const splitColumnFlag = (flag: number): { storage: number; kind: number } => ({
  storage: (flag >>> 4) & 0x0f,
  kind: flag & 0x0f,
});

export const formatFlag = (value: number): string =>
  `0x${value.toString(16).padStart(2, "0")}`;
