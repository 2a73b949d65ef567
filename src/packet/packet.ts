import type { Readable, Writable } from "node:stream";
import {
  CipherError,
  SchemaMismatchError,
  StructuralError,
  TruncatedInputError,
} from "../binary/errors.js";
import { PRIMARY_HEADER_LENGTH, SECONDARY_HEADER_LENGTH, UTF_MAGIC } from "../binary/format.js";
import { readStreamToBuffer, writeChunks } from "../io/streams.js";
import type { TableCodec } from "../table/codec.js";
import { type CipherOptions, canUnmask, maskBuffer } from "./cipher.js";

export const PACKET_HEADER_LENGTH = 16;
export const DEFAULT_MAX_PAYLOAD_BYTES = 256 * 1024 * 1024;

export type PacketReadOptions = CipherOptions & {
  /** Largest payload length accepted from a packet header. */
  maxPayloadBytes?: number;
};

const MIN_PAYLOAD_LENGTH = PRIMARY_HEADER_LENGTH + SECONDARY_HEADER_LENGTH;

const encodeTag = (prefix: string): Buffer => {
  const tag = Buffer.from(prefix, "latin1");
  if (tag.length !== 4 || tag.toString("latin1") !== prefix) {
    throw new RangeError(`packet tag must be 4 single-byte characters, got "${prefix}"`);
  }
  return tag;
};

const startsWithMagic = (payload: Buffer): boolean =>
  payload.length >= UTF_MAGIC.length && payload.subarray(0, UTF_MAGIC.length).equals(UTF_MAGIC);

/**
 * A UTF table wrapped in a tagged envelope:
 *
 *   tag (4 bytes) | unknown (u32 LE) | payload length (u64 LE) | payload
 *
 * The payload is either a plain table or one masked with the packet cipher.
 */
export class Packet<T> {
  private encrypted: boolean;

  private constructor(
    readonly prefix: string,
    private readonly codec: TableCodec<T>,
    public table: T,
    /** Carried through unchanged; its meaning is unknown. */
    readonly unknownValue: number,
    encrypted: boolean
  ) {
    encodeTag(prefix);
    this.encrypted = encrypted;
  }

  static create<T>(prefix: string, codec: TableCodec<T>): Packet<T> {
    return new Packet(prefix, codec, codec.create(), 0, false);
  }

  static fromTable<T>(table: T, prefix: string, codec: TableCodec<T>): Packet<T> {
    return new Packet(prefix, codec, table, 0, false);
  }

  static read<T>(
    input: Uint8Array,
    prefix: string,
    codec: TableCodec<T>,
    options: PacketReadOptions = {}
  ): Packet<T> {
    const buffer = Buffer.from(input.buffer, input.byteOffset, input.length);
    const expectedTag = encodeTag(prefix);
    if (buffer.length < PACKET_HEADER_LENGTH) {
      throw new TruncatedInputError("packet header");
    }
    const tag = buffer.subarray(0, 4);
    if (!tag.equals(expectedTag)) {
      throw SchemaMismatchError.wrongTableSchema(
        `packet tag "${tag.toString("latin1")}" (expected "${prefix}")`
      );
    }
    const unknownValue = buffer.readUInt32LE(4);
    const declared = buffer.readBigUInt64LE(8);

    const limit = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    if (declared > BigInt(limit)) {
      throw new StructuralError(
        "AllocationLimit",
        `packet payload of ${declared} bytes exceeds the ${limit} byte limit`
      );
    }
    const length = Number(declared);
    if (length < MIN_PAYLOAD_LENGTH) {
      throw StructuralError.malformedHeader(`packet payload of ${length} bytes cannot hold a UTF table`);
    }
    if (PACKET_HEADER_LENGTH + length > buffer.length) {
      throw new TruncatedInputError("UTF table");
    }

    const payload = buffer.subarray(PACKET_HEADER_LENGTH, PACKET_HEADER_LENGTH + length);
    if (startsWithMagic(payload)) {
      return new Packet(prefix, codec, codec.read(payload), unknownValue, false);
    }
    if (!canUnmask(payload)) {
      throw new CipherError();
    }
    const table = maskBuffer(payload, options);
    if (!startsWithMagic(table)) {
      throw new CipherError("unmasked payload does not start with @UTF");
    }
    return new Packet(prefix, codec, codec.read(table), unknownValue, true);
  }

  static async fromStream<T>(
    readable: Readable,
    prefix: string,
    codec: TableCodec<T>,
    options: PacketReadOptions = {}
  ): Promise<Packet<T>> {
    return Packet.read(await readStreamToBuffer(readable), prefix, codec, options);
  }

  isEncrypted(): boolean {
    return this.encrypted;
  }

  enableEncryption(): void {
    this.encrypted = true;
  }

  disableEncryption(): void {
    this.encrypted = false;
  }

  write(options: CipherOptions = {}): Buffer {
    return Buffer.concat(this.chunks(options));
  }

  async writeTo(stream: Writable, options: CipherOptions = {}): Promise<void> {
    await writeChunks(stream, this.chunks(options));
  }

  private chunks(options: CipherOptions): Buffer[] {
    const table = this.codec.write(this.table);
    const payload = this.encrypted ? maskBuffer(table, options) : table;
    const header = Buffer.alloc(PACKET_HEADER_LENGTH);
    encodeTag(this.prefix).copy(header, 0);
    header.writeUInt32LE(this.unknownValue, 4);
    header.writeBigUInt64LE(BigInt(payload.length), 8);
    return [header, payload];
  }
}
