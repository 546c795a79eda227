/**
 * Bottom-up dedup of records
 *
 * Every record is keyed by its shape: field names plus field shapes, with
 * nested records replaced by their own keys. Records sharing a key collapse
 * into the first one registered, and every use-site becomes a Reference.
 * A reference back to the record being keyed is written as a self marker so
 * identical recursive shapes collapse too; references further out use the
 * target's identity.
 */

import {
  arrayOf,
  mapOf,
  optional,
  reference,
  type RecordNode,
  type TypeNode,
} from "../../types/type-graph.js";

interface Canonical {
  node: TypeNode;
  key: string;
}

export class Canonicalizer {
  /** Registered records by identity, in registration (post-) order */
  readonly definitions = new Map<string, RecordNode>();

  private byShape = new Map<string, string>();
  private aliases = new Map<string, string>();
  private chain: string[] = [];

  /**
   * Canonical identity for a record identity, following dedup aliases
   */
  resolve(name: string): string {
    let current = name;
    let next = this.aliases.get(current);
    while (next !== undefined) {
      current = next;
      next = this.aliases.get(current);
    }
    return current;
  }

  visit(node: TypeNode): Canonical {
    switch (node.kind) {
      case "primitive":
        return { node, key: node.type };
      case "unknown":
        return { node, key: "?" };
      case "array": {
        const element = this.visit(node.element);
        return { node: arrayOf(element.node), key: `[${element.key}]` };
      }
      case "optional": {
        const inner = this.visit(node.inner);
        return { node: optional(inner.node), key: `opt(${inner.key})` };
      }
      case "map": {
        const value = this.visit(node.value);
        return { node: mapOf(value.node), key: `{*:${value.key}}` };
      }
      case "union": {
        const variants = node.variants.map((variant) => this.visit(variant));
        return {
          node: { kind: "union", variants: variants.map((variant) => variant.node) },
          key: `(${variants.map((variant) => variant.key).sort().join("|")})`,
        };
      }
      case "reference": {
        const self = this.chain[this.chain.length - 1];
        const key = node.name === self ? "^self" : `@${this.resolve(node.name)}`;
        return { node, key };
      }
      case "record":
        return this.visitRecord(node);
    }
  }

  private visitRecord(record: RecordNode): Canonical {
    this.chain.push(record.name);
    const fields = record.fields.map((field) => ({
      name: field.name,
      canonical: this.visit(field.type),
    }));
    this.chain.pop();

    const key = `{${fields
      .map((field) => `${JSON.stringify(field.name)}:${field.canonical.key}`)
      .sort()
      .join(",")}}`;

    const existing = this.byShape.get(key);
    if (existing !== undefined) {
      this.aliases.set(record.name, existing);
      return { node: reference(existing), key: `@${existing}` };
    }

    this.byShape.set(key, record.name);
    this.definitions.set(record.name, {
      kind: "record",
      name: record.name,
      path: record.path,
      fields: fields.map((field) => ({ name: field.name, type: field.canonical.node })),
    });
    return { node: reference(record.name), key: `@${record.name}` };
  }
}
