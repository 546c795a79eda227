/**
 * Value tree - the generic parsed form of one input sample
 *
 * Every supported input format (JSON, YAML, TOML, NDJSON) is normalised into
 * this shape before inference, so the inferencer never sees format-specific
 * objects such as dates or YAML nodes.
 */

export type Primitive = null | boolean | number | bigint | string;

export interface ValueObject {
  [key: string]: Value;
}

export type Value = Primitive | Value[] | ValueObject;

/**
 * Input formats understood by the parsing layer
 */
export type InputFormat = "json" | "ndjson" | "yaml" | "toml";

export const INPUT_FORMATS: readonly InputFormat[] = [
  "json",
  "ndjson",
  "yaml",
  "toml",
];

export function isInputFormat(value: string): value is InputFormat {
  return (INPUT_FORMATS as readonly string[]).includes(value);
}

export function isValueObject(value: Value): value is ValueObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
