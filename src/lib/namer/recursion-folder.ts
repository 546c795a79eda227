/**
 * Recursion folding
 *
 * Recursive data (trees, linked lists) arrives as finitely nested records of
 * the same shape. A nested record whose field names match an enclosing
 * record, and whose fields are shape-compatible with it, is merged into the
 * enclosing record and replaced by a Reference to it. Records must carry
 * unique names before folding; the merged record keeps the outer name.
 */

import {
  arrayOf,
  mapOf,
  optional,
  reference,
  stripOptional,
  type RecordNode,
  type TypeNode,
} from "../../types/type-graph.js";
import { unionOf, unifyRecords } from "../inferencer/unify.js";

export function foldRecursion(node: TypeNode): TypeNode {
  switch (node.kind) {
    case "record":
      return foldRecord(node);
    case "array":
      return arrayOf(foldRecursion(node.element));
    case "optional":
      return optional(foldRecursion(node.inner));
    case "map":
      return mapOf(foldRecursion(node.value));
    case "union":
      return unionOf(node.variants.map(foldRecursion));
    default:
      return node;
  }
}

function foldRecord(record: RecordNode): RecordNode {
  let current = record;

  // Each pass removes at least one nested record, so this terminates
  for (;;) {
    const absorbed: RecordNode[] = [];
    const fields = current.fields.map((field) => ({
      name: field.name,
      type: extractOccurrences(field.type, current, absorbed),
    }));
    if (absorbed.length === 0) {
      break;
    }

    let merged: RecordNode = { ...current, fields };
    for (const occurrence of absorbed) {
      merged = unifyRecords(merged, occurrence);
    }
    current = merged;
  }

  return {
    ...current,
    fields: current.fields.map((field) => ({
      name: field.name,
      type: foldRecursion(field.type),
    })),
  };
}

/**
 * Replace every nested occurrence of `target` with a Reference to it,
 * collecting the replaced records
 */
function extractOccurrences(
  node: TypeNode,
  target: RecordNode,
  absorbed: RecordNode[],
): TypeNode {
  switch (node.kind) {
    case "record":
      if (isRecursiveOccurrence(target, node)) {
        absorbed.push(node);
        return reference(target.name);
      }
      return {
        ...node,
        fields: node.fields.map((field) => ({
          name: field.name,
          type: extractOccurrences(field.type, target, absorbed),
        })),
      };
    case "array":
      return arrayOf(extractOccurrences(node.element, target, absorbed));
    case "optional":
      return optional(extractOccurrences(node.inner, target, absorbed));
    case "map":
      return mapOf(extractOccurrences(node.value, target, absorbed));
    case "union":
      return unionOf(
        node.variants.map((variant) => extractOccurrences(variant, target, absorbed)),
      );
    default:
      return node;
  }
}

/**
 * Same non-empty field-name set, and every field shape-compatible
 */
export function isRecursiveOccurrence(
  ancestor: RecordNode,
  candidate: RecordNode,
): boolean {
  if (
    candidate.fields.length === 0 ||
    candidate.fields.length !== ancestor.fields.length
  ) {
    return false;
  }

  return candidate.fields.every((field) => {
    const match = ancestor.fields.find((other) => other.name === field.name);
    return match !== undefined && shapesCompatible(match.type, field.type);
  });
}

/**
 * Loose compatibility: could both observations describe the same slot of a
 * recursive type? Records and references are interchangeable, null and
 * Unknown fit anything.
 */
export function shapesCompatible(a: TypeNode, b: TypeNode): boolean {
  const left = stripOptional(a);
  const right = stripOptional(b);

  if (isOpen(left) || isOpen(right)) {
    return true;
  }
  if (left.kind === "union") {
    return left.variants.some((variant) => shapesCompatible(variant, right));
  }
  if (right.kind === "union") {
    return right.variants.some((variant) => shapesCompatible(left, variant));
  }
  if (isRecordLike(left) && isRecordLike(right)) {
    return true;
  }

  if (left.kind === "primitive" && right.kind === "primitive") {
    return left.type === right.type || (isNumeric(left.type) && isNumeric(right.type));
  }
  if (left.kind === "array" && right.kind === "array") {
    return shapesCompatible(left.element, right.element);
  }
  if (left.kind === "map" && right.kind === "map") {
    return shapesCompatible(left.value, right.value);
  }
  return false;
}

function isOpen(node: TypeNode): boolean {
  return node.kind === "unknown" || (node.kind === "primitive" && node.type === "null");
}

function isRecordLike(node: TypeNode): boolean {
  return node.kind === "record" || node.kind === "reference";
}

function isNumeric(type: string): boolean {
  return type === "int" || type === "float";
}
