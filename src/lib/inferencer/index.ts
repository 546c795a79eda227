/**
 * Inferencer module - type inference from value trees
 */

import {
  DEFAULT_INFERENCE_OPTIONS,
  type InferenceOptions,
} from "../../types/config.js";
import {
  UNKNOWN,
  arrayOf,
  mapOf,
  primitive,
  type RawTypeGraph,
  type TypeNode,
} from "../../types/type-graph.js";
import { isValueObject, type Value, type ValueObject } from "../../types/value.js";
import { InferenceError } from "../../utils/errors.js";
import {
  elementNameFrom,
  isPlainIdentifier,
  singularize,
  typeNameFrom,
} from "../../utils/naming.js";
import { classifyObject, mapCandidacy } from "./map-classifier.js";
import { unifyAll } from "./unify.js";

export * from "./type-equality.js";
export * from "./unify.js";
export * from "./map-classifier.js";

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

/**
 * Naming context of a position in the value tree: the name a record found
 * here would take, and the name its collection elements would take
 */
export interface Site {
  name: string;
  element: string;
}

/**
 * Normalize a user-supplied root name into a type identifier
 */
export function normalizeRootName(rootName: string): string {
  return isPlainIdentifier(rootName) ? rootName : typeNameFrom(rootName, "Root");
}

/**
 * Element type name for a root-level array
 *
 * @example
 * rootElementName("Users") // "User"
 * rootElementName("Root") // "Item"
 */
export function rootElementName(rootName: string): string {
  const singular = singularize(rootName);
  return singular !== rootName ? typeNameFrom(singular, "Item") : "Item";
}

export function resolveInferenceOptions(
  options: Partial<InferenceOptions> = {},
): InferenceOptions {
  return { ...DEFAULT_INFERENCE_OPTIONS, ...options };
}

/**
 * Infer the raw type tree for all samples of one root
 *
 * @throws InferenceError when `samples` is empty
 *
 * @example
 * const raw = infer([{ id: 1, name: "a" }, { id: 2 }], "User");
 * // raw.root: record User { id: int, name: Optional(string) }
 */
export function infer(
  samples: readonly Value[],
  rootName: string,
  options: Partial<InferenceOptions> = {},
): RawTypeGraph {
  if (samples.length === 0) {
    throw new InferenceError("EMPTY_INPUT", "No samples supplied for inference", {
      rootName,
    });
  }

  const config = resolveInferenceOptions(options);
  const name = normalizeRootName(rootName);
  const site: Site = { name, element: rootElementName(name) };

  const root = unifyAll(samples.map((sample) => inferValue(sample, site, "", config)));

  return { rootName: name, root, sampleCount: samples.length };
}

/**
 * Infer the type of a single value
 */
export function inferValue(
  value: Value,
  site: Site,
  path: string,
  config: InferenceOptions,
): TypeNode {
  if (value === null) {
    return primitive("null");
  }

  switch (typeof value) {
    case "boolean":
      return primitive("bool");
    case "string":
      return primitive("string");
    case "number":
      if (config.integersAsBigInt) {
        return primitive("float");
      }
      return primitive(Number.isSafeInteger(value) ? "int" : "float");
    case "bigint":
      return primitive(value >= I64_MIN && value <= I64_MAX ? "int" : "float");
  }

  const elementSite: Site = { name: site.element, element: site.element };

  if (Array.isArray(value)) {
    const elementPath = `${path}[]`;
    return arrayOf(
      unifyAll(value.map((item) => inferValue(item, elementSite, elementPath, config))),
    );
  }

  if (isValueObject(value)) {
    return inferObject(value, site, elementSite, path, config);
  }

  return UNKNOWN;
}

function inferObject(
  object: ValueObject,
  site: Site,
  elementSite: Site,
  path: string,
  config: InferenceOptions,
): TypeNode {
  const keys = Object.keys(object);

  const candidacy = mapCandidacy(keys, path, config);
  if (candidacy) {
    const valuePath = path ? `${path}.*` : "*";
    const valueType = unifyAll(
      keys.map((key) => inferValue(object[key], elementSite, valuePath, config)),
    );
    if (classifyObject(keys, path, valueType, config, candidacy) === "map") {
      return mapOf(valueType);
    }
  }

  return {
    kind: "record",
    name: site.name,
    path,
    fields: keys.map((key) => ({
      name: key,
      type: inferValue(
        object[key],
        { name: typeNameFrom(key, "Field"), element: elementNameFrom(key, "Item") },
        path ? `${path}.${key}` : key,
        config,
      ),
    })),
  };
}

