import type { JsonTokenHandler } from "./streamParser.js";
import { JsonNumber, type JsonObject, type JsonValue, setJsonProperty } from "./jsonValue.js";

type Frame =
  | { kind: "object"; value: JsonObject; pendingKey?: string }
  | { kind: "array"; value: JsonValue[] };

/** Builds one JSON document from parser tokens. */
export class JsonAssembler implements JsonTokenHandler {
  private readonly stack: Frame[] = [];
  private root: JsonValue | undefined;
  private done = false;

  startObject(): void {
    const value: JsonObject = {};
    this.put(value);
    this.stack.push({ kind: "object", value });
  }

  endObject(): void {
    this.pop("object");
  }

  startArray(): void {
    const value: JsonValue[] = [];
    this.put(value);
    this.stack.push({ kind: "array", value });
  }

  endArray(): void {
    this.pop("array");
  }

  key(key: string): void {
    const frame = this.stack.at(-1);
    if (frame?.kind !== "object" || frame.pendingKey !== undefined) {
      throw new Error(`unexpected key "${key}"`);
    }
    frame.pendingKey = key;
  }

  string(value: string): void {
    this.put(value);
  }

  number(text: string): void {
    this.put(new JsonNumber(text));
  }

  boolean(value: boolean): void {
    this.put(value);
  }

  null(): void {
    this.put(null);
  }

  /** The finished document; throws while any container is still open. */
  result(): JsonValue {
    if (!this.done || this.root === undefined) {
      throw new Error("JSON document is incomplete");
    }
    return this.root;
  }

  private put(value: JsonValue): void {
    const frame = this.stack.at(-1);
    if (frame === undefined) {
      if (this.root !== undefined) {
        throw new Error("more than one JSON document in the stream");
      }
      this.root = value;
      this.done = typeof value !== "object" || value === null || value instanceof JsonNumber;
      return;
    }
    if (frame.kind === "array") {
      frame.value.push(value);
      return;
    }
    if (frame.pendingKey === undefined) {
      throw new Error("object value without a key");
    }
    setJsonProperty(frame.value, frame.pendingKey, value);
    frame.pendingKey = undefined;
  }

  private pop(kind: Frame["kind"]): void {
    const frame = this.stack.pop();
    if (frame?.kind !== kind) {
      throw new Error(`unbalanced end of ${kind}`);
    }
    if (this.stack.length === 0) {
      this.done = true;
    }
  }
}
