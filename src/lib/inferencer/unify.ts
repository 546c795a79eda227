/**
 * Unification of type observations
 *
 * unify() merges two TypeNodes seen at the same logical position. It is
 * commutative and associative up to field/variant order, idempotent, and
 * has Unknown as its identity.
 */

import {
  UNKNOWN,
  arrayOf,
  mapOf,
  optional,
  primitive,
  stripOptional,
  type PrimitiveNode,
  type RecordField,
  type RecordNode,
  type TypeNode,
} from "../../types/type-graph.js";
import { typeEquals } from "./type-equality.js";

export function unify(a: TypeNode, b: TypeNode): TypeNode {
  if (a.kind === "optional" || b.kind === "optional") {
    return optional(unify(stripOptional(a), stripOptional(b)));
  }
  if (a.kind === "unknown") {
    return b;
  }
  if (b.kind === "unknown") {
    return a;
  }

  if (a.kind !== "union" && b.kind !== "union") {
    const merged = mergeVariant(a, b);
    if (merged) {
      return merged;
    }
  }

  return unionOf([a, b]);
}

/**
 * Fold any number of observations, left to right
 */
export function unifyAll(nodes: Iterable<TypeNode>): TypeNode {
  let result: TypeNode = UNKNOWN;
  for (const node of nodes) {
    result = unify(result, node);
  }
  return result;
}

/**
 * Field-wise merge: fields missing on either side become Optional
 */
export function unifyRecords(a: RecordNode, b: RecordNode): RecordNode {
  const fields: RecordField[] = [];
  const seen = new Set<string>();

  for (const field of a.fields) {
    seen.add(field.name);
    const other = b.fields.find((candidate) => candidate.name === field.name);
    fields.push({
      name: field.name,
      type: other ? unify(field.type, other.type) : optional(field.type),
    });
  }

  for (const field of b.fields) {
    if (!seen.has(field.name)) {
      fields.push({ name: field.name, type: optional(field.type) });
    }
  }

  return { kind: "record", name: a.name, path: a.path, fields };
}

/**
 * Build a flattened union. Members of the same shape family are merged, so
 * the result holds at most one primitive per kind and at most one array,
 * map and record; references stay distinct by name.
 */
export function unionOf(members: TypeNode[]): TypeNode {
  const variants: TypeNode[] = [];
  let isOptional = false;

  const insert = (node: TypeNode): void => {
    switch (node.kind) {
      case "union":
        node.variants.forEach(insert);
        return;
      case "unknown":
        return;
      case "optional":
        isOptional = true;
        insert(node.inner);
        return;
    }

    for (let i = 0; i < variants.length; i++) {
      const merged = mergeVariant(variants[i], node);
      if (merged) {
        variants[i] = merged;
        return;
      }
    }
    variants.push(node);
  };

  members.forEach(insert);

  const result: TypeNode =
    variants.length === 0
      ? UNKNOWN
      : variants.length === 1
        ? variants[0]
        : { kind: "union", variants };

  return isOptional ? optional(result) : result;
}

/**
 * Merge two non-union nodes of the same family, or return null when they
 * must stay separate union variants
 */
function mergeVariant(existing: TypeNode, incoming: TypeNode): TypeNode | null {
  if (typeEquals(existing, incoming)) {
    return existing;
  }

  if (existing.kind === "primitive" && incoming.kind === "primitive") {
    return widenNumeric(existing, incoming);
  }
  if (existing.kind === "array" && incoming.kind === "array") {
    return arrayOf(unify(existing.element, incoming.element));
  }
  if (existing.kind === "map" && incoming.kind === "map") {
    return mapOf(unify(existing.value, incoming.value));
  }
  if (existing.kind === "record" && incoming.kind === "record") {
    return unifyRecords(existing, incoming);
  }

  return null;
}

function widenNumeric(a: PrimitiveNode, b: PrimitiveNode): PrimitiveNode | null {
  const numeric = (node: PrimitiveNode) =>
    node.type === "int" || node.type === "float";
  return numeric(a) && numeric(b) ? primitive("float") : null;
}
