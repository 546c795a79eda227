/**
 * Assembler module - dependency ordering of named records
 */

import type { RecordNode, TypeGraph } from "../../types/type-graph.js";
import { referencedNames } from "../namer/rewrite.js";

/**
 * Records in declaration order plus the records that sit on a reference cycle
 */
export interface Assembly {
  records: RecordNode[];
  cyclic: ReadonlySet<string>;
}

/**
 * Names of the records `record` refers to, in field order
 */
export function dependenciesOf(record: RecordNode): string[] {
  return referencedNames(record);
}

/**
 * Topological order: every record comes after the records it depends on.
 * Back-edges of a cycle are left as forward references; ties follow
 * first-seen order from the root, so the result is deterministic.
 */
export function order(graph: TypeGraph): RecordNode[] {
  const ordered: RecordNode[] = [];
  const visiting = new Set<string>();
  const done = new Set<string>();

  const visit = (name: string): void => {
    if (done.has(name) || visiting.has(name)) {
      return;
    }
    const record = graph.records.get(name);
    if (!record) {
      return;
    }

    visiting.add(name);
    dependenciesOf(record).forEach(visit);
    visiting.delete(name);

    done.add(name);
    ordered.push(record);
  };

  referencedNames(graph.root).forEach(visit);
  // Unreachable records still get declared, after everything reachable
  for (const name of graph.records.keys()) {
    visit(name);
  }

  return ordered;
}

/**
 * Records that can reach themselves through references
 */
export function findCyclicRecords(graph: TypeGraph): Set<string> {
  const cyclic = new Set<string>();

  for (const [name, record] of graph.records) {
    const seen = new Set<string>();
    const stack = [...dependenciesOf(record)];

    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) {
        continue;
      }
      if (next === name) {
        cyclic.add(name);
        break;
      }
      seen.add(next);
      const target = graph.records.get(next);
      if (target) {
        stack.push(...dependenciesOf(target));
      }
    }
  }

  return cyclic;
}

export function assemble(graph: TypeGraph): Assembly {
  return { records: order(graph), cyclic: findCyclicRecords(graph) };
}
