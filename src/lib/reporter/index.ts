/**
 * Reporter module - conversion statistics
 */

import type { TypeGraph, TypeNode } from "../../types/type-graph.js";
import type {
  ComplexityLabel,
  ConversionReport,
  ConversionStats,
  ReportInput,
} from "./types.js";

export type {
  ComplexityLabel,
  ConversionReport,
  ConversionStats,
  ReportInput,
} from "./types.js";

/**
 * Nesting depth contributed by one field type. Optional adds nothing; a
 * reference counts as one level without following it.
 */
export function typeDepth(node: TypeNode): number {
  switch (node.kind) {
    case "primitive":
    case "unknown":
      return 0;
    case "reference":
    case "record":
      return 1;
    case "optional":
      return typeDepth(node.inner);
    case "array":
      return 1 + typeDepth(node.element);
    case "map":
      return 1 + typeDepth(node.value);
    case "union":
      return Math.max(0, ...node.variants.map(typeDepth));
  }
}

export function computeStats(graph: TypeGraph, input: ReportInput = {}): ConversionStats {
  let fieldsCount = 0;
  let optionalFieldsCount = 0;
  let arrayFieldsCount = 0;
  let maxDepth = 0;

  for (const record of graph.records.values()) {
    fieldsCount += record.fields.length;
    for (const field of record.fields) {
      const inner = field.type.kind === "optional" ? field.type.inner : field.type;
      if (field.type.kind === "optional") {
        optionalFieldsCount++;
      }
      if (inner.kind === "array") {
        arrayFieldsCount++;
      }
      maxDepth = Math.max(maxDepth, typeDepth(field.type));
    }
  }

  return {
    typesCount: graph.records.size,
    fieldsCount,
    optionalFieldsCount,
    arrayFieldsCount,
    nestedTypesCount: Math.max(0, graph.records.size - 1),
    maxDepth,
    durationMs: input.durationMs ?? 0,
    inputSize: input.inputSize ?? 0,
    outputSize: input.outputSize ?? 0,
  };
}

/**
 * Complexity score from 1 to 10
 */
export function complexityScore(stats: ConversionStats): number {
  const score =
    Math.min(stats.typesCount, 10) +
    Math.min(Math.floor(stats.fieldsCount / 5), 10) +
    Math.min(stats.maxDepth * 2, 10) +
    Math.min(stats.optionalFieldsCount, 5) +
    Math.min(stats.nestedTypesCount, 5);

  return Math.min(10, Math.max(1, Math.ceil(score / 4)));
}

export function complexityLabel(score: number): ComplexityLabel {
  if (score <= 3) {
    return "Simple";
  }
  if (score <= 6) {
    return "Moderate";
  }
  return score <= 9 ? "Complex" : "Very Complex";
}

/**
 * Format bytes in human-readable form
 *
 * @example
 * formatBytes(500) // "500 B"
 * formatBytes(2048) // "2.0 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function buildReport(
  graph: TypeGraph,
  target: string,
  input: ReportInput = {},
): ConversionReport {
  const stats = computeStats(graph, input);
  const score = complexityScore(stats);
  return {
    target,
    rootName: graph.rootName,
    stats,
    complexity: { score, label: complexityLabel(score) },
    input: formatBytes(stats.inputSize),
    output: formatBytes(stats.outputSize),
  };
}
