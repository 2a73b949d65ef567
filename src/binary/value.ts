import { ValueConversionError } from "./errors.js";
import { ValueKind, valueKindName } from "./format.js";
import { type PrimitiveOf, defaultPrimitive } from "./primitive.js";

/**
 * A value type stored in a UTF table through one of the eleven primitive
 * kinds. Conversions may throw; the reader and writer report failures as
 * ValueConversionError naming both sides.
 */
export interface ValueType<T, K extends ValueKind = ValueKind> {
  readonly kind: K;
  readonly name: string;
  fromPrimitive(value: PrimitiveOf<K>): T;
  toPrimitive(value: T): PrimitiveOf<K>;
  /** Value of a freshly created column; defaults to converting the kind's zero value. */
  defaultValue?(): T;
}

export type ValueOf<V> = V extends ValueType<infer T, ValueKind> ? T : never;

const identity = <K extends ValueKind>(kind: K): ValueType<PrimitiveOf<K>, K> => ({
  kind,
  name: valueKindName(kind),
  fromPrimitive: (value) => value,
  toPrimitive: (value) => value,
});

export const u8 = identity(ValueKind.U8);
export const i8 = identity(ValueKind.I8);
export const u16 = identity(ValueKind.U16);
export const i16 = identity(ValueKind.I16);
export const u32 = identity(ValueKind.U32);
export const i32 = identity(ValueKind.I32);
export const u64 = identity(ValueKind.U64);
export const i64 = identity(ValueKind.I64);
export const f32 = identity(ValueKind.F32);
export const str = identity(ValueKind.STR);
export const blob = identity(ValueKind.BLOB);

export const defineValue = <T, K extends ValueKind>(
  kind: K,
  name: string,
  conversions: {
    fromPrimitive: (value: PrimitiveOf<K>) => T;
    toPrimitive: (value: T) => PrimitiveOf<K>;
    defaultValue?: () => T;
  }
): ValueType<T, K> => ({
  kind,
  name,
  fromPrimitive: conversions.fromPrimitive,
  toPrimitive: conversions.toPrimitive,
  defaultValue: conversions.defaultValue,
});

/** Booleans stored as a u8 flag; anything but 0 or 1 is rejected. */
export const bool = defineValue(ValueKind.U8, "boolean", {
  fromPrimitive: (value): boolean => {
    if (value !== 0 && value !== 1) {
      throw new RangeError(`expected 0 or 1, got ${value}`);
    }
    return value === 1;
  },
  toPrimitive: (value: boolean) => (value ? 1 : 0),
});

export class WrongSizeError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(`wrong size: expected ${expected} bytes, got ${actual}`);
    this.name = "WrongSizeError";
  }
}

/** A blob that must always hold exactly `size` bytes (hashes, keys, ...). */
export const fixedBytes = (size: number): ValueType<Buffer, ValueKind.BLOB> =>
  defineValue(ValueKind.BLOB, `bytes[${size}]`, {
    fromPrimitive: (value) => {
      if (value.length !== size) {
        throw new WrongSizeError(size, value.length);
      }
      return Buffer.from(value);
    },
    toPrimitive: (value) => {
      if (value.length !== size) {
        throw new WrongSizeError(size, value.length);
      }
      return value;
    },
    defaultValue: () => Buffer.alloc(size),
  });

export const defaultValueOf = <T, K extends ValueKind>(type: ValueType<T, K>): T =>
  type.defaultValue ? type.defaultValue() : fromPrimitive(type, defaultPrimitive(type.kind));

export const fromPrimitive = <T, K extends ValueKind>(
  type: ValueType<T, K>,
  value: PrimitiveOf<K>
): T => {
  try {
    return type.fromPrimitive(value);
  } catch (error) {
    throw new ValueConversionError(valueKindName(type.kind), type.name, error);
  }
};

export const toPrimitive = <T, K extends ValueKind>(
  type: ValueType<T, K>,
  value: T
): PrimitiveOf<K> => {
  try {
    return type.toPrimitive(value);
  } catch (error) {
    throw new ValueConversionError(type.name, valueKindName(type.kind), error);
  }
};
