import { buildTypeGraph } from '../../../src/lib/generator/index.js';
import type { TypeGraph } from '../../../src/types/type-graph.js';
import type { Value } from '../../../src/types/value.js';

export function graphFor(samples: Value[], rootName = 'Root'): TypeGraph {
  return buildTypeGraph(samples, rootName);
}

/** Two user samples exercising optional, renamed, nested, array and union fields */
export const USER_SAMPLES: Value[] = [
  { id: 1, 'first-name': 'Ada', tags: ['x'], address: { city: 'c', zip: 'z' }, score: 1 },
  { id: 2, tags: [], address: { city: 'd', zip: 'y' }, score: 'high' },
];

export const TREE_SAMPLES: Value[] = [{ id: 1, children: [{ id: 2, children: [] }] }];

export const LIST_SAMPLES: Value[] = [{ value: 1, next: { value: 2, next: null } }];
