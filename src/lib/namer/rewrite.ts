/**
 * Structural rewrites over TypeNodes
 */

import {
  arrayOf,
  mapOf,
  optional,
  type RecordNode,
  type TypeNode,
} from "../../types/type-graph.js";

/**
 * Rebuild `node` with every record renamed by `rename`
 */
export function renameRecords(
  node: TypeNode,
  rename: (record: RecordNode) => string,
): TypeNode {
  switch (node.kind) {
    case "record":
      return {
        ...node,
        name: rename(node),
        fields: node.fields.map((field) => ({
          name: field.name,
          type: renameRecords(field.type, rename),
        })),
      };
    case "array":
      return arrayOf(renameRecords(node.element, rename));
    case "optional":
      return optional(renameRecords(node.inner, rename));
    case "map":
      return mapOf(renameRecords(node.value, rename));
    case "union":
      return {
        kind: "union",
        variants: node.variants.map((variant) => renameRecords(variant, rename)),
      };
    default:
      return node;
  }
}

/**
 * Rebuild `node` with every reference target mapped through `rename`
 */
export function renameReferences(
  node: TypeNode,
  rename: (name: string) => string,
): TypeNode {
  switch (node.kind) {
    case "reference":
      return { kind: "reference", name: rename(node.name) };
    case "record":
      return {
        ...node,
        fields: node.fields.map((field) => ({
          name: field.name,
          type: renameReferences(field.type, rename),
        })),
      };
    case "array":
      return arrayOf(renameReferences(node.element, rename));
    case "optional":
      return optional(renameReferences(node.inner, rename));
    case "map":
      return mapOf(renameReferences(node.value, rename));
    case "union":
      return {
        kind: "union",
        variants: node.variants.map((variant) => renameReferences(variant, rename)),
      };
    default:
      return node;
  }
}

/**
 * Reference targets in `node`, in first-seen order, without descending
 * into referenced records
 */
export function referencedNames(node: TypeNode, into: string[] = []): string[] {
  switch (node.kind) {
    case "reference":
      if (!into.includes(node.name)) {
        into.push(node.name);
      }
      break;
    case "record":
      node.fields.forEach((field) => referencedNames(field.type, into));
      break;
    case "array":
      referencedNames(node.element, into);
      break;
    case "optional":
      referencedNames(node.inner, into);
      break;
    case "map":
      referencedNames(node.value, into);
      break;
    case "union":
      node.variants.forEach((variant) => referencedNames(variant, into));
      break;
  }
  return into;
}
