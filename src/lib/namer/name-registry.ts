/**
 * Collision-free identifier allocation for one finalize() run
 */

import { NamingCollisionError } from "../../utils/errors.js";

export const MAX_NAME_SUFFIX = 10_000;

export class NameRegistry {
  private used = new Set<string>();
  private counters = new Map<string, number>();

  constructor(private readonly maxSuffix: number = MAX_NAME_SUFFIX) {}

  reserve(name: string): void {
    this.used.add(name);
  }

  has(name: string): boolean {
    return this.used.has(name);
  }

  /**
   * Claim `base`, or `base` plus the next free numeric suffix
   *
   * @example
   * registry.claim("Item") // "Item"
   * registry.claim("Item") // "Item1"
   */
  claim(base: string): string {
    if (!this.used.has(base)) {
      this.used.add(base);
      return base;
    }

    let counter = this.counters.get(base) ?? 0;
    let candidate: string;
    do {
      counter++;
      if (counter > this.maxSuffix) {
        throw new NamingCollisionError(`Unable to find a free name for "${base}"`, {
          base,
          attempts: this.maxSuffix,
        });
      }
      candidate = `${base}${counter}`;
    } while (this.used.has(candidate));

    this.counters.set(base, counter);
    this.used.add(candidate);
    return candidate;
  }
}
