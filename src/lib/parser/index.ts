/**
 * Parser module - text to Value samples
 */

import { extname } from "path";
import { parse as parseToml } from "smol-toml";
import { parse as parseYamlText, parseAllDocuments } from "yaml";
import type { InputFormat, Value } from "../../types/value.js";
import { ParseError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { toValue } from "./value-mapper.js";

export * from "./value-mapper.js";

const EXTENSION_FORMATS: Readonly<Record<string, InputFormat>> = {
  ".json": "json",
  ".ndjson": "ndjson",
  ".jsonl": "ndjson",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
};

/**
 * Input format implied by a file name
 *
 * @example
 * detectFormat("users.yml", "json") // "yaml"
 * detectFormat("-", "json") // "json"
 */
export function detectFormat(path: string, fallback: InputFormat): InputFormat {
  const extension = extname(path).toLowerCase();
  return Object.hasOwn(EXTENSION_FORMATS, extension) ? EXTENSION_FORMATS[extension] : fallback;
}

function parseJson(text: string, source: string): Value {
  try {
    JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Invalid JSON in ${source}`, { source }, { cause: error });
  }

  // JSON.parse reads `1.0` as 1; the YAML JSON schema keeps the literal kinds apart
  let raw: unknown;
  try {
    raw = parseYamlText(text, { schema: "json", intAsBigInt: true, uniqueKeys: false });
  } catch (error) {
    throw new ParseError(`Invalid JSON in ${source}`, { source }, { cause: error });
  }
  return toValue(raw);
}

function parseNdjson(text: string, source: string): Value[] {
  const samples: Value[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    samples.push(parseJson(line, `${source}:${index + 1}`));
  });
  return samples;
}

function parseYaml(text: string, source: string): Value[] {
  const samples: Value[] = [];
  for (const document of parseAllDocuments(text, { intAsBigInt: true })) {
    const [first] = document.errors;
    if (first !== undefined) {
      throw new ParseError(`Invalid YAML in ${source}: ${first.message}`, {
        source,
        code: first.code,
      });
    }
    // A bare `---` separator yields a document without contents
    if (document.contents === null) {
      continue;
    }
    const raw: unknown = document.toJS();
    samples.push(toValue(raw));
  }
  return samples;
}

function parseTomlDocument(text: string, source: string): Value {
  let raw: unknown;
  try {
    raw = parseToml(text, { integersAsBigInt: true });
  } catch (error) {
    throw new ParseError(`Invalid TOML in ${source}`, { source }, { cause: error });
  }
  return toValue(raw);
}

/**
 * Parse every sample contained in `text`. Integers come back as bigint and
 * other numbers as number; infer with `integersAsBigInt` set.
 *
 * @throws ParseError on malformed input
 */
export function parseSamples(
  text: string,
  format: InputFormat,
  source: string = "<input>",
): Value[] {
  logger.debug("Parsing input", { source, format, bytes: text.length });

  let samples: Value[];
  switch (format) {
    case "json":
      samples = [parseJson(text, source)];
      break;
    case "ndjson":
      samples = parseNdjson(text, source);
      break;
    case "yaml":
      samples = parseYaml(text, source);
      break;
    case "toml":
      samples = [parseTomlDocument(text, source)];
      break;
  }

  logger.debug("Input parsed", { source, samples: samples.length });
  return samples;
}

/**
 * Parse a single sample; for multi-document input the first document
 *
 * @throws ParseError on malformed or empty input
 */
export function parse(text: string, format: InputFormat, source?: string): Value {
  const [first] = parseSamples(text, format, source);
  if (first === undefined) {
    throw new ParseError(`No document found in ${source ?? "<input>"}`, { format });
  }
  return first;
}
