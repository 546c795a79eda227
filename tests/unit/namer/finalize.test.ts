/**
 * Unit tests for dedup, naming and recursion folding
 */

import { describe, it, expect } from 'vitest';
import { infer } from '../../../src/lib/inferencer/index.js';
import {
  finalize,
  NameRegistry,
  isRecursiveOccurrence,
  shapesCompatible,
  referencedNames,
} from '../../../src/lib/namer/index.js';
import { NamingCollisionError } from '../../../src/utils/errors.js';
import {
  UNKNOWN,
  arrayOf,
  optional,
  primitive,
  reference,
  type RecordNode,
  type TypeNode,
} from '../../../src/types/type-graph.js';
import type { Value } from '../../../src/types/value.js';

const int = primitive('int');
const str = primitive('string');
const nul = primitive('null');

const build = (samples: Value[], rootName = 'Root') => finalize(infer(samples, rootName));

function fieldsOf(record: RecordNode | undefined): Record<string, TypeNode> {
  return Object.fromEntries((record?.fields ?? []).map((field) => [field.name, field.type]));
}

function collectRecords(node: TypeNode, into: RecordNode[] = []): RecordNode[] {
  switch (node.kind) {
    case 'record':
      into.push(node);
      node.fields.forEach((field) => collectRecords(field.type, into));
      break;
    case 'array':
      collectRecords(node.element, into);
      break;
    case 'optional':
      collectRecords(node.inner, into);
      break;
    case 'map':
      collectRecords(node.value, into);
      break;
    case 'union':
      node.variants.forEach((variant) => collectRecords(variant, into));
      break;
  }
  return into;
}

describe('finalize', () => {
  it('should name the root record and reference it from the root', () => {
    const graph = build([{ id: 1, name: 'a' }, { id: 2 }], 'User');
    expect(graph.rootName).toBe('User');
    expect(graph.root).toEqual(reference('User'));
    expect([...graph.records.keys()]).toEqual(['User']);
    expect(fieldsOf(graph.records.get('User'))).toEqual({ id: int, name: optional(str) });
  });

  it('should name root array elements Item', () => {
    const graph = build([[{ id: 1 }, { id: 2 }]]);
    expect(graph.root).toEqual(arrayOf(reference('Item')));
    expect([...graph.records.keys()]).toEqual(['Item']);
    expect(fieldsOf(graph.records.get('Item'))).toEqual({ id: int });
  });

  it('should keep a map root without records', () => {
    const graph = build([{ a: 1, b: 2, c: 3, d: 4, e: 5 }]);
    expect(graph.root).toEqual({ kind: 'map', value: int });
    expect(graph.records.size).toBe(0);
  });

  it('should fold recursive trees into a self reference', () => {
    const graph = build([{ id: 1, children: [{ id: 2, children: [] }] }], 'Node');
    expect([...graph.records.keys()]).toEqual(['Node']);
    expect(fieldsOf(graph.records.get('Node'))).toEqual({
      id: int,
      children: arrayOf(reference('Node')),
    });
  });

  it('should fold deeper trees', () => {
    const graph = build(
      [{ id: 1, children: [{ id: 2, children: [{ id: 3, children: [] }] }] }],
      'Node',
    );
    expect([...graph.records.keys()]).toEqual(['Node']);
    expect(fieldsOf(graph.records.get('Node'))).toEqual({
      id: int,
      children: arrayOf(reference('Node')),
    });
  });

  it('should fold linked lists into a nullable self reference', () => {
    const graph = build([{ value: 1, next: { value: 2, next: null } }], 'ListNode');
    expect([...graph.records.keys()]).toEqual(['ListNode']);
    expect(fieldsOf(graph.records.get('ListNode'))).toEqual({
      value: int,
      next: { kind: 'union', variants: [reference('ListNode'), nul] },
    });
  });

  it('should dedupe structurally identical records under the first name', () => {
    const graph = build([
      { billing: { city: 'a', zip: '1' }, shipping: { zip: '2', city: 'b' } },
    ]);
    expect([...graph.records.keys()]).toEqual(['Root', 'Billing']);
    expect(fieldsOf(graph.records.get('Root'))).toEqual({
      billing: reference('Billing'),
      shipping: reference('Billing'),
    });
  });

  it('should suffix colliding names in first-seen order', () => {
    const graph = build([{ item: { a: 1 }, items: [{ b: 'x' }] }]);
    expect([...graph.records.keys()]).toEqual(['Root', 'Item', 'Item1']);
    expect(fieldsOf(graph.records.get('Item'))).toEqual({ a: int });
    expect(fieldsOf(graph.records.get('Item1'))).toEqual({ b: str });
  });

  it('should reserve the root name', () => {
    const graph = build([{ user: { name: 'a' } }], 'User');
    expect([...graph.records.keys()]).toEqual(['User', 'User1']);
    expect(fieldsOf(graph.records.get('User'))).toEqual({ user: reference('User1') });
  });

  it('should leave no inline records and no dangling references', () => {
    const graph = build([
      { id: 1, owner: { name: 'a', pets: [{ kind: 'cat' }] }, tags: { x: { kind: 'dog' } } },
      { id: 2, children: [{ id: 3 }] },
    ]);
    for (const record of graph.records.values()) {
      for (const field of record.fields) {
        expect(collectRecords(field.type)).toEqual([]);
        for (const name of referencedNames(field.type)) {
          expect(graph.records.has(name)).toBe(true);
        }
      }
    }
    expect(collectRecords(graph.root)).toEqual([]);
  });

  it('should accept a different root name at finalize time', () => {
    const graph = finalize(infer([{ id: 1 }], 'Root'), 'Account');
    expect(graph.rootName).toBe('Account');
    expect(graph.root).toEqual(reference('Account'));
  });

  it('should suffix records whose name is reserved', () => {
    const graph = finalize(infer([{ option: { a: 1 }, options: [{ b: 2 }] }], 'Root'), 'Root', [
      'Option',
    ]);
    expect([...graph.records.keys()]).toEqual(['Root', 'Option1', 'Option2']);
  });
});

describe('NameRegistry', () => {
  it('should hand out suffixed names starting at 1', () => {
    const registry = new NameRegistry();
    expect(registry.claim('Item')).toBe('Item');
    expect(registry.claim('Item')).toBe('Item1');
    expect(registry.claim('Item')).toBe('Item2');
  });

  it('should skip reserved names', () => {
    const registry = new NameRegistry();
    registry.reserve('Item');
    registry.reserve('Item1');
    expect(registry.claim('Item')).toBe('Item2');
    expect(registry.has('Item2')).toBe(true);
  });

  it('should throw once suffixes are exhausted', () => {
    const registry = new NameRegistry(2);
    registry.claim('A');
    registry.claim('A');
    registry.claim('A');
    expect(() => registry.claim('A')).toThrow(NamingCollisionError);
  });
});

describe('recursion detection', () => {
  const record = (fields: Record<string, TypeNode>): RecordNode => ({
    kind: 'record',
    name: '#0',
    path: '',
    fields: Object.entries(fields).map(([name, type]) => ({ name, type })),
  });

  it('should require the same field names', () => {
    expect(isRecursiveOccurrence(record({ id: int, next: nul }), record({ id: int }))).toBe(false);
    expect(isRecursiveOccurrence(record({ id: int }), record({ id: int }))).toBe(true);
  });

  it('should never treat empty records as recursive', () => {
    expect(isRecursiveOccurrence(record({}), record({}))).toBe(false);
  });

  it('should require compatible field shapes', () => {
    expect(isRecursiveOccurrence(record({ id: int }), record({ id: str }))).toBe(false);
  });

  it('should treat null and Unknown as compatible with anything', () => {
    expect(shapesCompatible(nul, arrayOf(int))).toBe(true);
    expect(shapesCompatible(arrayOf(UNKNOWN), arrayOf(str))).toBe(true);
    expect(shapesCompatible(int, primitive('float'))).toBe(true);
    expect(shapesCompatible(reference('#0'), record({ a: int }))).toBe(true);
    expect(shapesCompatible(int, str)).toBe(false);
  });
});
