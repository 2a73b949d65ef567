/** A JSON number kept as its source text. */
export class JsonNumber {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }
}

export type JsonObject = { [key: string]: JsonValue };

export type JsonValue = null | boolean | string | JsonNumber | JsonValue[] | JsonObject;

export const isJsonObject = (value: JsonValue): value is JsonObject =>
  value !== null &&
  typeof value === "object" &&
  !Array.isArray(value) &&
  !(value instanceof JsonNumber);

/** Sets `key` as an own property, including keys such as `__proto__`. */
export const setJsonProperty = (object: JsonObject, key: string, value: JsonValue): void => {
  Object.defineProperty(object, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
};

export const getJsonProperty = (object: JsonObject, key: string): JsonValue | undefined =>
  Object.hasOwn(object, key) ? object[key] : undefined;

const render = (value: JsonValue, indent: string, depth: number): string => {
  if (value === null || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (value instanceof JsonNumber) {
    return value.text;
  }

  const inner = indent.repeat(depth + 1);
  const outer = indent.repeat(depth);
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return "[]";
    }
    const items = value.map((item) => `${inner}${render(item, indent, depth + 1)}`);
    return `[\n${items.join(",\n")}\n${outer}]`;
  }

  const keys = Object.keys(value);
  if (keys.length === 0) {
    return "{}";
  }
  const members = keys.map(
    (key) => `${inner}${JSON.stringify(key)}: ${render(value[key], indent, depth + 1)}`
  );
  return `{\n${members.join(",\n")}\n${outer}}`;
};

/** Like `JSON.stringify(value, null, indent)`, but numbers are written as their text. */
export const stringifyJson = (value: JsonValue, indent = "  "): string => render(value, indent, 0);
