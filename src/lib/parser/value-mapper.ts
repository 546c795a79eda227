/**
 * Library output to Value mappers
 */

import type { Value, ValueObject } from "../../types/value.js";
import { ParseError } from "../../utils/errors.js";

/**
 * Date → ISO 8601 string
 */
export function mapDate(value: Date): string {
  if (Number.isNaN(value.getTime())) {
    throw new ParseError("Invalid date value in input");
  }
  return value.toISOString();
}

function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function setField(object: ValueObject, key: string, value: Value): void {
  // Plain assignment would treat "__proto__" as a prototype change
  Object.defineProperty(object, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Recursively normalise whatever a format library produced into a Value.
 * Dates become ISO strings; YAML maps become plain objects.
 *
 * @throws ParseError for undefined, functions, symbols, other host objects
 * and self-referencing aliases
 */
export function toValue(
  input: unknown,
  path: string = "",
  ancestors: WeakSet<object> = new WeakSet(),
): Value {
  switch (typeof input) {
    case "boolean":
    case "number":
    case "bigint":
    case "string":
      return input;
  }

  if (typeof input !== "object") {
    throw new ParseError(`Unsupported ${typeof input} value at "${path || "$"}"`, {
      path,
    });
  }
  if (input === null) {
    return null;
  }

  if (input instanceof Date) {
    return mapDate(input);
  }

  if (ancestors.has(input)) {
    throw new ParseError(`Cyclic alias at "${path || "$"}"`, { path });
  }

  ancestors.add(input);
  try {
    return toContainer(input, path, ancestors);
  } finally {
    ancestors.delete(input);
  }
}

function toContainer(input: object, path: string, ancestors: WeakSet<object>): Value {
  if (Array.isArray(input)) {
    return input.map((item: unknown) => toValue(item, `${path}[]`, ancestors));
  }

  if (input instanceof Map) {
    const object: ValueObject = {};
    for (const [key, value] of input) {
      const name = String(key);
      setField(object, name, toValue(value, childPath(path, name), ancestors));
    }
    return object;
  }

  const prototype: unknown = Object.getPrototypeOf(input);
  if (prototype !== Object.prototype && prototype !== null) {
    throw new ParseError(`Unsupported object value at "${path || "$"}"`, {
      path,
      constructor: input.constructor.name,
    });
  }

  const object: ValueObject = {};
  for (const [key, value] of Object.entries(input)) {
    setField(object, key, toValue(value, childPath(path, key), ancestors));
  }
  return object;
}
