import { formatFlag } from "./format.js";

export type UtfErrorCode =
  | "MalformedHeader"
  | "InvalidColumnStorage"
  | "InvalidColumnType"
  | "AllocationLimit"
  | "EOF"
  | "WrongColumnName"
  | "WrongColumnType"
  | "WrongColumnStorage"
  | "WrongTableSchema"
  | "InvalidManifest"
  | "StringNotFound"
  | "BlobNotFound"
  | "StringMalformed"
  | "ValueConversion"
  | "DecryptionError"
  | "RowSizeMismatch"
  | "OptionalColumnConflict"
  | "MissingRowValue"
  | "FieldCountOverflow";

/**
 * Base class of every error raised by the codec. `code` identifies the exact
 * condition; the subclass identifies its family, so callers probing several
 * candidate schemas can tell "wrong shape" from "corrupt input".
 */
export class UtfTableError extends Error {
  constructor(
    readonly code: UtfErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "UtfTableError";
  }
}

export const isUtfTableError = (value: unknown): value is UtfTableError =>
  value instanceof UtfTableError;

/** Header, region layout or flag nibbles are not valid for the format. */
export class StructuralError extends UtfTableError {
  constructor(code: "MalformedHeader" | "InvalidColumnStorage" | "InvalidColumnType" | "AllocationLimit", message: string) {
    super(code, message);
    this.name = "StructuralError";
  }

  static malformedHeader(detail?: string): StructuralError {
    return new StructuralError(
      "MalformedHeader",
      detail ? `malformed header: ${detail}` : "malformed header"
    );
  }

  static invalidColumnStorage(flag: number): StructuralError {
    return new StructuralError(
      "InvalidColumnStorage",
      `invalid column storage flag: ${formatFlag(flag)}`
    );
  }

  static invalidColumnType(flag: number): StructuralError {
    return new StructuralError("InvalidColumnType", `invalid column type flag: ${formatFlag(flag)}`);
  }
}

/** Input ended before a field could be read completely. */
export class TruncatedInputError extends UtfTableError {
  constructor(readonly context: string) {
    super("EOF", `reached end of file early (at ${context})`);
    this.name = "TruncatedInputError";
  }
}

/** A valid table that does not have the shape the caller asked for. */
export class SchemaMismatchError extends UtfTableError {
  constructor(
    code: "WrongColumnName" | "WrongColumnType" | "WrongColumnStorage" | "WrongTableSchema" | "InvalidManifest",
    message: string
  ) {
    super(code, message);
    this.name = "SchemaMismatchError";
  }

  static wrongColumnName(actual: string, expected: string): SchemaMismatchError {
    return new SchemaMismatchError(
      "WrongColumnName",
      `wrong column name: "${actual}" (expected "${expected}")`
    );
  }

  static wrongColumnType(actual: number, expected: number): SchemaMismatchError {
    return new SchemaMismatchError(
      "WrongColumnType",
      `wrong column type flag: ${formatFlag(actual)} (expected ${formatFlag(expected)})`
    );
  }

  static wrongColumnStorage(actual: number, expected: string): SchemaMismatchError {
    return new SchemaMismatchError(
      "WrongColumnStorage",
      `wrong column storage flag: ${formatFlag(actual)} (expected ${expected})`
    );
  }

  static wrongTableSchema(detail?: string): SchemaMismatchError {
    return new SchemaMismatchError(
      "WrongTableSchema",
      detail ? `wrong table schema: ${detail}` : "wrong table schema"
    );
  }
}

/** The table's data disagrees with its own string or blob pool. */
export class DataIntegrityError extends UtfTableError {
  constructor(code: "StringNotFound" | "BlobNotFound" | "StringMalformed", message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "DataIntegrityError";
  }
}

export class ValueConversionError extends UtfTableError {
  constructor(
    readonly sourceType: string,
    readonly targetType: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("ValueConversion", `failed to convert ${sourceType} to ${targetType}: ${detail}`, { cause });
    this.name = "ValueConversionError";
  }
}

export class CipherError extends UtfTableError {
  constructor(message = "payload is neither a plain nor a masked UTF table") {
    super("DecryptionError", message);
    this.name = "CipherError";
  }
}

/** The writer was asked to emit a table that would be corrupt. */
export class WriteConsistencyError extends UtfTableError {
  constructor(
    code: "RowSizeMismatch" | "OptionalColumnConflict" | "MissingRowValue" | "FieldCountOverflow",
    message: string,
    readonly column?: string
  ) {
    super(code, message);
    this.name = "WriteConsistencyError";
  }

  static optionalColumnConflict(column: string): WriteConsistencyError {
    return new WriteConsistencyError(
      "OptionalColumnConflict",
      `optional column "${column}" is present in some rows and absent in others`,
      column
    );
  }
}
