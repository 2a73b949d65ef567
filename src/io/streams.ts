import { createReadStream as fsCreateReadStream, createWriteStream as fsCreateWriteStream } from "node:fs";
import type { ReadStream, WriteStream } from "node:fs";
import { once } from "node:events";
import type { Readable, Writable } from "node:stream";

const READ_HIGH_WATER_MARK = 64 * 1024;
const WRITE_HIGH_WATER_MARK = 16 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: ReadStream | WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

export const createReadStream = (path: string, signal?: AbortSignal): ReadStream => {
  const stream = fsCreateReadStream(path, {
    highWaterMark: READ_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

/** Collects a readable into one buffer; string chunks are taken as UTF-8. */
export const readStreamToBuffer = async (readable: Readable): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of readable) {
    if (typeof chunk === "string") {
      chunks.push(Buffer.from(chunk, "utf8"));
    } else if (chunk instanceof Uint8Array) {
      chunks.push(Buffer.from(chunk));
    } else {
      throw new TypeError("expected a byte or string stream");
    }
  }
  return Buffer.concat(chunks);
};

/** Writes `chunks` in order, waiting for `drain` whenever the stream asks for it. */
export const writeChunks = async (stream: Writable, chunks: readonly Uint8Array[]): Promise<void> => {
  for (const chunk of chunks) {
    if (chunk.length === 0) {
      continue;
    }
    if (!stream.write(chunk)) {
      await once(stream, "drain");
    }
  }
};
