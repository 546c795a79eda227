/**
 * Structural equality over TypeNodes
 *
 * Record names and source paths are ignored, as is the order of record
 * fields and union variants.
 */

import type { TypeNode } from "../../types/type-graph.js";

export function typeEquals(a: TypeNode, b: TypeNode): boolean {
  if (a === b) {
    return true;
  }

  switch (a.kind) {
    case "primitive":
      return b.kind === "primitive" && a.type === b.type;
    case "unknown":
      return b.kind === "unknown";
    case "array":
      return b.kind === "array" && typeEquals(a.element, b.element);
    case "optional":
      return b.kind === "optional" && typeEquals(a.inner, b.inner);
    case "map":
      return b.kind === "map" && typeEquals(a.value, b.value);
    case "reference":
      return b.kind === "reference" && a.name === b.name;
    case "union":
      return (
        b.kind === "union" &&
        a.variants.length === b.variants.length &&
        a.variants.every((variant) =>
          b.variants.some((other) => typeEquals(variant, other)),
        )
      );
    case "record":
      return (
        b.kind === "record" &&
        a.fields.length === b.fields.length &&
        a.fields.every((field) => {
          const match = b.fields.find((other) => other.name === field.name);
          return match !== undefined && typeEquals(field.type, match.type);
        })
      );
  }
}

/**
 * Number of alternatives a node stands for: 0 for Unknown, the variant
 * count for a Union, 1 otherwise
 */
export function variantCount(node: TypeNode): number {
  switch (node.kind) {
    case "unknown":
      return 0;
    case "union":
      return node.variants.length;
    case "optional":
      return variantCount(node.inner);
    default:
      return 1;
  }
}
