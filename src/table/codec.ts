/** Anything that can create, decode and encode one table shape. */
export interface TableCodec<T> {
  create(): T;
  read(input: Uint8Array): T;
  write(table: T): Buffer;
}
