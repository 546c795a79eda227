/**
 * Namer module - turns the raw inferred tree into a finalized TypeGraph
 *
 * Pipeline: give every record a unique working identity, fold recursive
 * occurrences into their ancestors, collapse structurally identical records,
 * then walk from the root assigning final names in first-seen order.
 */

import type { RawTypeGraph, RecordNode, TypeGraph } from "../../types/type-graph.js";
import { normalizeRootName } from "../inferencer/index.js";
import { Canonicalizer } from "./canonicalizer.js";
import { NameRegistry } from "./name-registry.js";
import { foldRecursion } from "./recursion-folder.js";
import { referencedNames, renameRecords, renameReferences } from "./rewrite.js";

export * from "./name-registry.js";
export * from "./recursion-folder.js";
export * from "./rewrite.js";
export { Canonicalizer } from "./canonicalizer.js";

/**
 * Finalize a raw graph: fold recursion, dedup records and assign names.
 * `reserved` names are never given to a record; a clash gets a suffix.
 *
 * @example
 * const graph = finalize(infer([{ id: 1, children: [{ id: 2, children: [] }] }], "Node"));
 * // graph.records: Node { id: int, children: Array(Reference("Node")) }
 */
export function finalize(
  raw: RawTypeGraph,
  rootName: string = raw.rootName,
  reserved: Iterable<string> = [],
): TypeGraph {
  const name = normalizeRootName(rootName);

  // Working identities: unique per record, hint kept on the side
  const hints = new Map<string, string>();
  let counter = 0;
  const identified = renameRecords(raw.root, (record) => {
    const identity = `#${counter++}`;
    hints.set(identity, record.name);
    return identity;
  });
  const rootIdentity = raw.root.kind === "record" ? "#0" : undefined;

  const folded = foldRecursion(identified);

  const canonicalizer = new Canonicalizer();
  const canonicalRoot = canonicalizer.visit(folded).node;

  const rootCanonical =
    rootIdentity === undefined ? undefined : canonicalizer.resolve(rootIdentity);

  const registry = new NameRegistry();
  registry.reserve(name);
  for (const reservedName of reserved) {
    registry.reserve(reservedName);
  }
  const finalNames = new Map<string, string>();
  const order: string[] = [];

  const claim = (identity: string): void => {
    const resolved = canonicalizer.resolve(identity);
    if (finalNames.has(resolved)) {
      return;
    }
    const definition = canonicalizer.definitions.get(resolved);
    if (!definition) {
      return;
    }

    finalNames.set(
      resolved,
      resolved === rootCanonical ? name : registry.claim(hints.get(resolved) ?? "Item"),
    );
    order.push(resolved);
    for (const field of definition.fields) {
      referencedNames(field.type).forEach(claim);
    }
  };
  referencedNames(canonicalRoot).forEach(claim);

  const toFinal = (identity: string): string => {
    const resolved = canonicalizer.resolve(identity);
    return finalNames.get(resolved) ?? resolved;
  };

  const records = new Map<string, RecordNode>();
  for (const identity of order) {
    const definition = canonicalizer.definitions.get(identity);
    if (!definition) {
      continue;
    }
    const finalName = toFinal(identity);
    records.set(finalName, {
      kind: "record",
      name: finalName,
      path: definition.path,
      fields: definition.fields.map((field) => ({
        name: field.name,
        type: renameReferences(field.type, toFinal),
      })),
    });
  }

  return {
    rootName: name,
    root: renameReferences(canonicalRoot, toFinal),
    records,
  };
}
