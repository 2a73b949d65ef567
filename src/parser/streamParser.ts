import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import pkg from "stream-json";
const { parser } = pkg;

/**
 * Receives JSON structure as stream-json tokenizes it. Numbers arrive as
 * their source text so 64-bit integers survive untouched.
 */
export interface JsonTokenHandler {
  startObject(): void | Promise<void>;
  endObject(): void | Promise<void>;
  startArray(): void | Promise<void>;
  endArray(): void | Promise<void>;
  key(key: string): void | Promise<void>;
  string(value: string): void | Promise<void>;
  number(text: string): void | Promise<void>;
  boolean(value: boolean): void | Promise<void>;
  null(): void | Promise<void>;
}

export type JsonStreamOptions = {
  /** Deepest allowed nesting of objects and arrays. Defaults to 64. */
  maxDepth?: number;
  signal?: AbortSignal;
};

export const DEFAULT_MAX_DEPTH = 64;

type JsonToken = {
  name: string;
  value?: unknown;
};

const isJsonToken = (chunk: unknown): chunk is JsonToken =>
  typeof chunk === "object" && chunk !== null && "name" in chunk && typeof chunk.name === "string";

const tokenText = (token: JsonToken): string => {
  if (typeof token.value !== "string") {
    throw new Error(`${token.name} token is missing its value`);
  }
  return token.value;
};

const dispatchToken = (handler: JsonTokenHandler, token: JsonToken): void | Promise<void> => {
  switch (token.name) {
    case "startObject":
      return handler.startObject();
    case "endObject":
      return handler.endObject();
    case "startArray":
      return handler.startArray();
    case "endArray":
      return handler.endArray();
    case "keyValue":
      return handler.key(tokenText(token));
    case "stringValue":
      return handler.string(tokenText(token));
    case "numberValue":
      return handler.number(tokenText(token));
    case "trueValue":
      return handler.boolean(true);
    case "falseValue":
      return handler.boolean(false);
    case "nullValue":
      return handler.null();
    default:
      throw new Error(`unexpected JSON token "${token.name}"`);
  }
};

const depthChange = (name: string): number => {
  if (name === "startObject" || name === "startArray") {
    return 1;
  }
  if (name === "endObject" || name === "endArray") {
    return -1;
  }
  return 0;
};

/**
 * Feeds every token of the JSON document in `readable` to `handler`, in
 * order, awaiting asynchronous handlers before the next token.
 */
export const parseJsonStream = async (
  readable: Readable,
  handler: JsonTokenHandler,
  options: JsonStreamOptions = {}
): Promise<void> => {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  let depth = 0;

  const consume = async (tokens: AsyncIterable<unknown>): Promise<void> => {
    for await (const token of tokens) {
      if (!isJsonToken(token)) {
        throw new TypeError("JSON parser produced a malformed token");
      }
      depth += depthChange(token.name);
      if (depth > maxDepth) {
        throw new RangeError(`JSON nesting exceeds ${maxDepth} levels`);
      }
      await dispatchToken(handler, token);
    }
  };

  // Packed values only; the streamed chunk tokens would repeat them.
  const tokenizer = parser({ packValues: true, streamValues: false });
  await pipeline(readable, tokenizer, consume, { signal: options.signal });
};
