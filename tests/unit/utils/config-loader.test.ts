/**
 * Unit tests for generate configuration loading
 */

import { describe, it, expect } from 'vitest';
import {
  loadGenerateConfig,
  DEFAULT_ROOT_NAME,
  DEFAULT_TARGET,
} from '../../../src/utils/config-loader.js';
import { DEFAULT_INFERENCE_OPTIONS, DEFAULT_RENDER_OPTIONS } from '../../../src/types/config.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('loadGenerateConfig', () => {
  it('should apply defaults', () => {
    const config = loadGenerateConfig();
    expect(config.rootName).toBe(DEFAULT_ROOT_NAME);
    expect(config.target).toBe(DEFAULT_TARGET);
    expect(config.inputFormat).toBeUndefined();
    expect(config.inference).toEqual(DEFAULT_INFERENCE_OPTIONS);
    expect(config.render).toEqual(DEFAULT_RENDER_OPTIONS);
  });

  it('should let CLI options override the config file', () => {
    const config = loadGenerateConfig(
      { mapThreshold: 10, target: 'rust', indentSize: 2 },
      {
        target: 'python',
        rootName: 'Event',
        inference: { mapThreshold: 6, maxMapValueVariants: 2 },
        render: { indentSize: 3, includeComments: true },
      },
    );
    expect(config.target).toBe('rust');
    expect(config.rootName).toBe('Event');
    expect(config.inference.mapThreshold).toBe(10);
    expect(config.inference.maxMapValueVariants).toBe(2);
    expect(config.render.indentSize).toBe(2);
    expect(config.render.includeComments).toBe(true);
  });

  it('should only treat negated flags as overrides when false', () => {
    const fromFile = { inference: { detectKeyPatterns: false }, render: { publicFields: false } };
    const untouched = loadGenerateConfig({ keyPatterns: true, publicFields: true }, fromFile);
    expect(untouched.inference.detectKeyPatterns).toBe(false);
    expect(untouched.render.publicFields).toBe(false);

    const negated = loadGenerateConfig({ keyPatterns: false, publicFields: false });
    expect(negated.inference.detectKeyPatterns).toBe(false);
    expect(negated.render.publicFields).toBe(false);
  });

  it('should split the derive list', () => {
    const config = loadGenerateConfig({ derive: 'Debug, PartialEq,' });
    expect(config.render.deriveMacros).toEqual(['Debug', 'PartialEq']);
  });

  it('should reject invalid values', () => {
    expect(() => loadGenerateConfig({ inputFormat: 'xml' })).toThrow(ConfigError);
    expect(() => loadGenerateConfig({ indentStyle: 'mixed' })).toThrow(ConfigError);
    expect(() => loadGenerateConfig({ mapThreshold: -1 })).toThrow(/Map threshold/);
    expect(() => loadGenerateConfig({ mapThreshold: Number.NaN })).toThrow(ConfigError);
    expect(() => loadGenerateConfig({ maxMapValueVariants: 0 })).toThrow(ConfigError);
    expect(() => loadGenerateConfig({ indentSize: 9 })).toThrow(/Indent size/);
    expect(() => loadGenerateConfig({ rootName: ' ' })).toThrow(ConfigError);
  });

  it('should reject invalid key patterns', () => {
    expect(() =>
      loadGenerateConfig({}, { inference: { patterns: [{ name: 'BAD', regex: '[' }] } }),
    ).toThrow(/Invalid regex pattern for BAD/);
    expect(() =>
      loadGenerateConfig({}, {
        inference: {
          patterns: [
            { name: 'A', regex: 'a' },
            { name: 'A', regex: 'b' },
          ],
        },
      }),
    ).toThrow(/Duplicate pattern name/);
  });

  it('should reject overlapping force paths', () => {
    expect(() =>
      loadGenerateConfig({}, { inference: { forceMapPaths: ['a'], forceRecordPaths: ['a'] } }),
    ).toThrow(/both forceMapPaths and forceRecordPaths: a/);
  });
});
