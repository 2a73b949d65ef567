const DEFAULT_SINK_SIZE = 4 * 1024;

/**
 * Growable in-memory byte buffer used for the writer's column, row, string
 * and blob regions. Grows by doubling so appends stay amortised O(1).
 */
export class ByteSink {
  private buffer: Buffer;
  private cursor = 0;

  constructor(initialSize = DEFAULT_SINK_SIZE) {
    this.buffer = Buffer.allocUnsafe(Math.max(initialSize, 16));
  }

  get length(): number {
    return this.cursor;
  }

  writeUInt8(value: number): void {
    this.ensureSpace(1);
    this.buffer.writeUInt8(value, this.cursor);
    this.cursor += 1;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureSpace(bytes.length);
    this.buffer.set(bytes, this.cursor);
    this.cursor += bytes.length;
  }

  /** View of the written bytes; only valid until the next write. */
  view(): Buffer {
    return this.buffer.subarray(0, this.cursor);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.view());
  }

  private ensureSpace(size: number): void {
    if (this.cursor + size <= this.buffer.length) {
      return;
    }
    let newSize = this.buffer.length * 2;
    while (newSize < this.cursor + size) {
      newSize *= 2;
    }
    const next = Buffer.allocUnsafe(newSize);
    this.buffer.copy(next, 0, 0, this.cursor);
    this.buffer = next;
  }
}
