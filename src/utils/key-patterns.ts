/**
 * Key pattern detection utilities for map classification
 */

import type { KeyPatternConfig } from "../types/config.js";

/**
 * Compiled regex pattern for id-like keys
 */
export interface CompiledPattern {
  name: string;
  regex: RegExp;
}

/**
 * Pattern match result
 */
export interface PatternMatch {
  pattern: string;
  matchCount: number;
  totalKeys: number;
  matchRatio: number;
}

const compiledCache = new WeakMap<KeyPatternConfig[], CompiledPattern[]>();

/**
 * Compile regex patterns from configuration
 *
 * @throws Error if a pattern is not a valid regular expression
 */
export function compilePatterns(patterns: KeyPatternConfig[]): CompiledPattern[] {
  const cached = compiledCache.get(patterns);
  if (cached) {
    return cached;
  }

  const compiled = patterns.map((pattern) => {
    try {
      return { name: pattern.name, regex: new RegExp(pattern.regex) };
    } catch (error) {
      throw new Error(
        `Invalid regex pattern for ${pattern.name}: ${pattern.regex}`,
        { cause: error },
      );
    }
  });

  compiledCache.set(patterns, compiled);
  return compiled;
}

/**
 * Calculate pattern match ratio for a set of keys
 */
export function calculatePatternMatch(
  keys: string[],
  pattern: CompiledPattern,
): PatternMatch {
  const matchCount = keys.filter((key) => pattern.regex.test(key)).length;
  const totalKeys = keys.length;

  return {
    pattern: pattern.name,
    matchCount,
    totalKeys,
    matchRatio: totalKeys > 0 ? matchCount / totalKeys : 0,
  };
}

/**
 * Find best matching pattern for a set of keys
 *
 * @returns Best pattern match, or null if no pattern matches any key
 */
export function findBestPattern(
  keys: string[],
  patterns: CompiledPattern[],
): PatternMatch | null {
  let bestMatch: PatternMatch | null = null;

  for (const pattern of patterns) {
    const match = calculatePatternMatch(keys, pattern);
    if (match.matchCount > 0 && (!bestMatch || match.matchRatio > bestMatch.matchRatio)) {
      bestMatch = match;
    }
  }

  return bestMatch;
}

/**
 * Name of the pattern every key matches, or null
 *
 * @example
 * keysShareIdPattern(["2024-01-01", "2024-01-02"], patterns) // "ISO_DATE"
 */
export function keysShareIdPattern(
  keys: string[],
  patterns: CompiledPattern[],
): string | null {
  const best = findBestPattern(keys, patterns);
  return best && best.matchRatio === 1 ? best.pattern : null;
}
