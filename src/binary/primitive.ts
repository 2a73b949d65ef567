import { ByteSink } from "./byteSink.js";
import { ValueConversionError } from "./errors.js";
import { ValueKind, valueKindName } from "./format.js";

export type PrimitiveMap = {
  [ValueKind.U8]: number;
  [ValueKind.I8]: number;
  [ValueKind.U16]: number;
  [ValueKind.I16]: number;
  [ValueKind.U32]: number;
  [ValueKind.I32]: number;
  [ValueKind.U64]: bigint;
  [ValueKind.I64]: bigint;
  [ValueKind.F32]: number;
  [ValueKind.STR]: string;
  [ValueKind.BLOB]: Uint8Array;
};

export type PrimitiveOf<K extends ValueKind> = PrimitiveMap[K];
export type PrimitiveValue = PrimitiveMap[ValueKind];

export type StorageMethod = "number" | "string" | "blob";

/** Pools a reader resolves string and blob references against. */
export type DecodePools = {
  strings: ReadonlyMap<number, string>;
  blobs: Buffer;
};

/** Pools a writer accumulates while encoding values. */
export class EncodePools {
  readonly strings = new ByteSink();
  readonly blobs = new ByteSink();
  private readonly stringOffsets = new Map<string, number>();

  /** Returns the pool offset of `value`, appending it the first time it is seen. */
  internString(value: string): number {
    const existing = this.stringOffsets.get(value);
    if (existing !== undefined) {
      return existing;
    }
    return this.appendString(value);
  }

  /**
   * Appends `value` even when it is already pooled, so the caller gets a
   * fresh, predictable offset. Later lookups keep resolving to the first copy.
   */
  appendString(value: string): number {
    const offset = this.strings.length;
    this.strings.writeBytes(Buffer.from(value, "utf8"));
    this.strings.writeUInt8(0);
    if (!this.stringOffsets.has(value)) {
      this.stringOffsets.set(value, offset);
    }
    return offset;
  }

  appendBlob(bytes: Uint8Array): { offset: number; length: number } {
    const offset = this.blobs.length;
    this.blobs.writeBytes(bytes);
    return { offset, length: bytes.length };
  }

  get uniqueStringCount(): number {
    return this.stringOffsets.size;
  }
}

export interface PrimitiveCodec<K extends ValueKind> {
  readonly kind: K;
  readonly name: string;
  /** Bytes the value occupies in a column or row record. */
  readonly width: number;
  readonly storage: StorageMethod;
  accepts(value: unknown): value is PrimitiveOf<K>;
  /** Returns null when a string or blob reference does not resolve. */
  decode(bytes: Buffer, pools: DecodePools): PrimitiveOf<K> | null;
  encode(value: PrimitiveOf<K>, pools: EncodePools): Buffer;
}

const describeValue = (value: unknown): string => {
  if (value instanceof Uint8Array) return "bytes";
  if (value === null) return "null";
  return typeof value;
};

const rangeFailure = (kind: ValueKind, value: unknown, reason: string): ValueConversionError =>
  new ValueConversionError(describeValue(value), valueKindName(kind), new RangeError(reason));

type IntegerKind =
  | ValueKind.U8
  | ValueKind.I8
  | ValueKind.U16
  | ValueKind.I16
  | ValueKind.U32
  | ValueKind.I32;

const integerCodec = <K extends IntegerKind>(
  kind: K,
  width: number,
  min: number,
  max: number,
  read: (bytes: Buffer) => number,
  write: (bytes: Buffer, value: number) => void
): PrimitiveCodec<K> => {
  const accepts = (value: unknown): value is PrimitiveOf<K> =>
    typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
  return {
    kind,
    name: valueKindName(kind),
    width,
    storage: "number",
    accepts,
    decode: (bytes) => read(bytes),
    encode: (value) => {
      if (!accepts(value)) {
        throw rangeFailure(kind, value, `${String(value)} is not an integer in [${min}, ${max}]`);
      }
      const bytes = Buffer.alloc(width);
      write(bytes, value);
      return bytes;
    },
  };
};

const bigintCodec = <K extends ValueKind.U64 | ValueKind.I64>(
  kind: K,
  min: bigint,
  max: bigint,
  read: (bytes: Buffer) => bigint,
  write: (bytes: Buffer, value: bigint) => void
): PrimitiveCodec<K> => {
  const accepts = (value: unknown): value is PrimitiveOf<K> =>
    typeof value === "bigint" && value >= min && value <= max;
  return {
    kind,
    name: valueKindName(kind),
    width: 8,
    storage: "number",
    accepts,
    decode: (bytes) => read(bytes),
    encode: (value) => {
      if (!accepts(value)) {
        throw rangeFailure(kind, value, `${String(value)} is not a bigint in [${min}, ${max}]`);
      }
      const bytes = Buffer.alloc(8);
      write(bytes, value);
      return bytes;
    },
  };
};

const f32Codec: PrimitiveCodec<ValueKind.F32> = {
  kind: ValueKind.F32,
  name: valueKindName(ValueKind.F32),
  width: 4,
  storage: "number",
  accepts: (value): value is number => typeof value === "number",
  decode: (bytes) => bytes.readFloatBE(0),
  encode: (value) => {
    if (typeof value !== "number") {
      throw rangeFailure(ValueKind.F32, value, "expected a number");
    }
    const bytes = Buffer.alloc(4);
    bytes.writeFloatBE(value, 0);
    return bytes;
  },
};

const stringCodec: PrimitiveCodec<ValueKind.STR> = {
  kind: ValueKind.STR,
  name: valueKindName(ValueKind.STR),
  width: 4,
  storage: "string",
  accepts: (value): value is string => typeof value === "string" && !value.includes("\0"),
  decode: (bytes, pools) => pools.strings.get(bytes.readUInt32BE(0)) ?? null,
  encode: (value, pools) => {
    if (typeof value !== "string") {
      throw rangeFailure(ValueKind.STR, value, "expected a string");
    }
    if (value.includes("\0")) {
      throw rangeFailure(ValueKind.STR, value, "string pool entries cannot contain NUL");
    }
    const bytes = Buffer.alloc(4);
    bytes.writeUInt32BE(pools.internString(value), 0);
    return bytes;
  },
};

const blobCodec: PrimitiveCodec<ValueKind.BLOB> = {
  kind: ValueKind.BLOB,
  name: valueKindName(ValueKind.BLOB),
  width: 8,
  storage: "blob",
  accepts: (value): value is Uint8Array => value instanceof Uint8Array,
  decode: (bytes, pools) => {
    const offset = bytes.readUInt32BE(0);
    const length = bytes.readUInt32BE(4);
    // A blob ending exactly at the end of the pool is valid.
    if (offset + length > pools.blobs.length) {
      return null;
    }
    return Buffer.from(pools.blobs.subarray(offset, offset + length));
  },
  encode: (value, pools) => {
    if (!(value instanceof Uint8Array)) {
      throw rangeFailure(ValueKind.BLOB, value, "expected bytes");
    }
    const { offset, length } = pools.appendBlob(value);
    const bytes = Buffer.alloc(8);
    bytes.writeUInt32BE(offset, 0);
    bytes.writeUInt32BE(length, 4);
    return bytes;
  },
};

const PRIMITIVE_CODECS: { readonly [K in ValueKind]: PrimitiveCodec<K> } = {
  [ValueKind.U8]: integerCodec(ValueKind.U8, 1, 0, 0xff, (b) => b.readUInt8(0), (b, v) => b.writeUInt8(v, 0)),
  [ValueKind.I8]: integerCodec(ValueKind.I8, 1, -0x80, 0x7f, (b) => b.readInt8(0), (b, v) => b.writeInt8(v, 0)),
  [ValueKind.U16]: integerCodec(ValueKind.U16, 2, 0, 0xffff, (b) => b.readUInt16BE(0), (b, v) => b.writeUInt16BE(v, 0)),
  [ValueKind.I16]: integerCodec(ValueKind.I16, 2, -0x8000, 0x7fff, (b) => b.readInt16BE(0), (b, v) => b.writeInt16BE(v, 0)),
  [ValueKind.U32]: integerCodec(ValueKind.U32, 4, 0, 0xffffffff, (b) => b.readUInt32BE(0), (b, v) => b.writeUInt32BE(v, 0)),
  [ValueKind.I32]: integerCodec(ValueKind.I32, 4, -0x80000000, 0x7fffffff, (b) => b.readInt32BE(0), (b, v) => b.writeInt32BE(v, 0)),
  [ValueKind.U64]: bigintCodec(ValueKind.U64, 0n, 0xffffffffffffffffn, (b) => b.readBigUInt64BE(0), (b, v) => b.writeBigUInt64BE(v, 0)),
  [ValueKind.I64]: bigintCodec(ValueKind.I64, -0x8000000000000000n, 0x7fffffffffffffffn, (b) => b.readBigInt64BE(0), (b, v) => b.writeBigInt64BE(v, 0)),
  [ValueKind.F32]: f32Codec,
  [ValueKind.STR]: stringCodec,
  [ValueKind.BLOB]: blobCodec,
};

export const primitiveCodec = <K extends ValueKind>(kind: K): PrimitiveCodec<K> =>
  PRIMITIVE_CODECS[kind];

export const primitiveWidth = (kind: ValueKind): number => PRIMITIVE_CODECS[kind].width;

/** Default value of a freshly created column of the given kind. */
export const defaultPrimitive = <K extends ValueKind>(kind: K): PrimitiveOf<K> => {
  const defaults: { readonly [P in ValueKind]: PrimitiveOf<P> } = {
    [ValueKind.U8]: 0,
    [ValueKind.I8]: 0,
    [ValueKind.U16]: 0,
    [ValueKind.I16]: 0,
    [ValueKind.U32]: 0,
    [ValueKind.I32]: 0,
    [ValueKind.U64]: 0n,
    [ValueKind.I64]: 0n,
    [ValueKind.F32]: 0,
    [ValueKind.STR]: "",
    [ValueKind.BLOB]: Buffer.alloc(0),
  };
  return defaults[kind];
};
