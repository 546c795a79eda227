/**
 * Unit tests for the renderer registry
 */

import { describe, it, expect } from 'vitest';
import {
  getRenderer,
  listTargets,
  resolveTarget,
  isRegisteredTarget,
  displayPath,
  reservedTypeNames,
} from '../../../src/lib/renderers/index.js';
import { UnregisteredTargetError } from '../../../src/utils/errors.js';

describe('Renderer registry', () => {
  it('should list every target', () => {
    expect(listTargets()).toEqual(['typescript', 'zod', 'python', 'rust']);
  });

  it('should resolve aliases case-insensitively', () => {
    expect(resolveTarget('ts')).toBe('typescript');
    expect(resolveTarget('PY')).toBe('python');
    expect(resolveTarget('rs')).toBe('rust');
    expect(resolveTarget('Zod')).toBe('zod');
  });

  it('should return the renderer for a target', () => {
    expect(getRenderer('rust').displayName).toBe('Rust (serde)');
  });

  it('should reject unknown targets', () => {
    expect(() => getRenderer('cobol')).toThrow(UnregisteredTargetError);
    expect(() => resolveTarget('constructor')).toThrow(UnregisteredTargetError);
    expect(isRegisteredTarget('cobol')).toBe(false);
    expect(isRegisteredTarget('ts')).toBe(true);
  });

  it('should collect reserved type names across targets', () => {
    const names = reservedTypeNames();
    expect(names).toContain('Record');
    expect(names).toContain('Field');
    expect(names).toContain('Option');
    expect(new Set(names).size).toBe(names.length);
  });

  it('should display value paths from the root', () => {
    expect(displayPath('')).toBe('$');
    expect(displayPath('users[].address')).toBe('$.users[].address');
    expect(displayPath('[]')).toBe('$[]');
  });
});
