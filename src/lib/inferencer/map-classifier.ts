/**
 * Map/record classification
 *
 * Objects used as lookup tables (ids, dates or other open-ended vocabularies
 * as keys) hold homogeneous values under many keys. Fixed-shape records hold
 * a small, stable set of differently-typed fields. An object becomes a Map
 * candidate by key count or by id-like keys, and is accepted as a Map only
 * when its values unify into a narrow type.
 */

import type { MapDetectionConfig } from "../../types/config.js";
import { stripOptional, type TypeNode } from "../../types/type-graph.js";
import { compilePatterns, keysShareIdPattern } from "../../utils/key-patterns.js";
import { variantCount } from "./type-equality.js";

/**
 * Why an object was considered for Map classification
 */
export type MapCandidacy =
  | { reason: "forced" }
  | { reason: "key-count"; keyCount: number }
  | { reason: "key-pattern"; pattern: string };

/**
 * Decide whether an object at `path` with these keys may be a Map
 *
 * @returns null when the object must be a Record
 *
 * @example
 * mapCandidacy(["a", "b", "c", "d", "e"], "", DEFAULT_INFERENCE_OPTIONS)
 * // { reason: "key-count", keyCount: 5 }
 */
export function mapCandidacy(
  keys: string[],
  path: string,
  config: MapDetectionConfig,
): MapCandidacy | null {
  if (config.forceRecordPaths.includes(path)) {
    return null;
  }
  if (config.forceMapPaths.includes(path)) {
    return { reason: "forced" };
  }

  if (keys.length > config.mapThreshold) {
    return { reason: "key-count", keyCount: keys.length };
  }

  if (config.detectKeyPatterns && keys.length >= config.minPatternKeys) {
    const pattern = keysShareIdPattern(keys, compilePatterns(config.patterns));
    if (pattern) {
      return { reason: "key-pattern", pattern };
    }
  }

  return null;
}

/**
 * Whether the unified value type of a candidate is narrow enough for a Map
 */
export function acceptsMapValue(
  valueType: TypeNode,
  config: MapDetectionConfig,
): boolean {
  return variantCount(stripOptional(valueType)) <= config.maxMapValueVariants;
}

/**
 * Full classification for an object whose value type is already known.
 * Callers that already asked mapCandidacy() pass its answer along.
 */
export function classifyObject(
  keys: string[],
  path: string,
  valueType: TypeNode,
  config: MapDetectionConfig,
  candidacy: MapCandidacy | null = mapCandidacy(keys, path, config),
): "map" | "record" {
  if (!candidacy) {
    return "record";
  }
  if (candidacy.reason === "forced" || acceptsMapValue(valueType, config)) {
    return "map";
  }
  return "record";
}
