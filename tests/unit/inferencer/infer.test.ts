/**
 * Unit tests for type inference
 */

import { describe, it, expect } from 'vitest';
import {
  infer,
  inferValue,
  normalizeRootName,
  rootElementName,
  resolveInferenceOptions,
  typeEquals,
} from '../../../src/lib/inferencer/index.js';
import { parseSamples } from '../../../src/lib/parser/index.js';
import { InferenceError } from '../../../src/utils/errors.js';
import {
  UNKNOWN,
  arrayOf,
  mapOf,
  optional,
  primitive,
} from '../../../src/types/type-graph.js';
import type { Value } from '../../../src/types/value.js';

const int = primitive('int');
const str = primitive('string');
const site = { name: 'Root', element: 'Item' };
const config = resolveInferenceOptions();

describe('Inferencer', () => {
  describe('inferValue', () => {
    it('should infer primitives', () => {
      expect(inferValue(null, site, '', config)).toEqual(primitive('null'));
      expect(inferValue(true, site, '', config)).toEqual(primitive('bool'));
      expect(inferValue('x', site, '', config)).toEqual(str);
      expect(inferValue(3, site, '', config)).toEqual(int);
      expect(inferValue(3.5, site, '', config)).toEqual(primitive('float'));
    });

    it('should treat unsafe integers as float and 64-bit bigints as int', () => {
      expect(inferValue(2 ** 60, site, '', config)).toEqual(primitive('float'));
      expect(inferValue(2n ** 62n, site, '', config)).toEqual(int);
      expect(inferValue(2n ** 64n, site, '', config)).toEqual(primitive('float'));
    });

    it('should read every number as a float when integers arrive as bigint', () => {
      const parsed = resolveInferenceOptions({ integersAsBigInt: true });
      expect(inferValue(1, site, '', parsed)).toEqual(primitive('float'));
      expect(inferValue(1n, site, '', parsed)).toEqual(int);
    });

    it('should infer Unknown elements for empty arrays', () => {
      expect(inferValue([], site, '', config)).toEqual(arrayOf(UNKNOWN));
    });

    it('should unify array elements', () => {
      expect(inferValue([1, 2.5], site, '', config)).toEqual(arrayOf(primitive('float')));
    });

    it('should name nested records after their key and record the path', () => {
      const node = inferValue({ shipping_address: { city: 'x' } }, site, '', config);
      expect(node).toEqual({
        kind: 'record',
        name: 'Root',
        path: '',
        fields: [
          {
            name: 'shipping_address',
            type: {
              kind: 'record',
              name: 'ShippingAddress',
              path: 'shipping_address',
              fields: [{ name: 'city', type: str }],
            },
          },
        ],
      });
    });

    it('should name array element records by the singular key', () => {
      const node = inferValue({ users: [{ id: 1 }] }, site, '', config);
      expect(node).toEqual({
        kind: 'record',
        name: 'Root',
        path: '',
        fields: [
          {
            name: 'users',
            type: arrayOf({
              kind: 'record',
              name: 'User',
              path: 'users[]',
              fields: [{ name: 'id', type: int }],
            }),
          },
        ],
      });
    });

    it('should infer maps for id-keyed objects', () => {
      const value: Value = { '2024-01-01': { count: 1 }, '2024-01-02': { count: 2 } };
      expect(inferValue({ daily: value }, site, '', config)).toEqual({
        kind: 'record',
        name: 'Root',
        path: '',
        fields: [
          {
            name: 'daily',
            type: mapOf({
              kind: 'record',
              name: 'Daily',
              path: 'daily.*',
              fields: [{ name: 'count', type: int }],
            }),
          },
        ],
      });
    });
  });

  describe('infer', () => {
    it('should reject empty input', () => {
      expect(() => infer([], 'Root')).toThrow(InferenceError);
      try {
        infer([], 'Root');
      } catch (error) {
        expect(error).toBeInstanceOf(InferenceError);
        if (error instanceof InferenceError) {
          expect(error.reason).toBe('EMPTY_INPUT');
        }
      }
    });

    it('should mark fields missing from some samples optional', () => {
      const raw = infer([{ id: 1, name: 'a' }, { id: 2 }], 'Root');
      expect(raw.sampleCount).toBe(2);
      expect(raw.root).toEqual({
        kind: 'record',
        name: 'Root',
        path: '',
        fields: [
          { name: 'id', type: int },
          { name: 'name', type: optional(str) },
        ],
      });
    });

    it('should infer a map for five int-valued keys with the default threshold', () => {
      const raw = infer([{ a: 1, b: 2, c: 3, d: 4, e: 5 }], 'Root', { mapThreshold: 4 });
      expect(raw.root).toEqual(mapOf(int));
    });

    it('should infer a union for conflicting primitive fields', () => {
      const raw = infer([{ value: 1 }, { value: 'x' }], 'Root');
      expect(raw.root).toEqual({
        kind: 'record',
        name: 'Root',
        path: '',
        fields: [{ name: 'value', type: { kind: 'union', variants: [int, str] } }],
      });
    });

    it('should be independent of sample order', () => {
      const samples: Value[] = [{ id: 1, tags: ['a'] }, { id: 2.5, extra: null }, { id: 3 }];
      const forward = infer(samples, 'Root').root;
      const backward = infer([...samples].reverse(), 'Root').root;
      expect(typeEquals(forward, backward)).toBe(true);
    });

    it('should infer float for parsed whole-number float literals', () => {
      const raw = infer(parseSamples('{"price": 1.0, "qty": 2}', 'json'), 'Root', {
        integersAsBigInt: true,
      });
      expect(raw.root).toEqual({
        kind: 'record',
        name: 'Root',
        path: '',
        fields: [
          { name: 'price', type: primitive('float') },
          { name: 'qty', type: int },
        ],
      });
    });

    it('should normalize the root name', () => {
      expect(infer([{ a: 1 }], 'api response').rootName).toBe('ApiResponse');
      expect(infer([{ a: 1 }], 'User').rootName).toBe('User');
    });
  });

  describe('root naming', () => {
    it('should keep plain identifiers', () => {
      expect(normalizeRootName('userProfile')).toBe('userProfile');
      expect(normalizeRootName('order-line')).toBe('OrderLine');
      expect(normalizeRootName('%%')).toBe('Root');
    });

    it('should derive the element name of a root array', () => {
      expect(rootElementName('Users')).toBe('User');
      expect(rootElementName('Root')).toBe('Item');
    });
  });
});
