/**
 * Rust renderer - serde structs
 */

import type { RecordNode, TypeNode } from "../../types/type-graph.js";
import { toSnakeCase } from "../../utils/naming.js";
import {
  BaseRenderer,
  displayPath,
  splitNullable,
  uniqueFieldNames,
  type RenderContext,
} from "./base.js";

const PRIMITIVES = {
  null: "Option<serde_json::Value>",
  bool: "bool",
  int: "i64",
  float: "f64",
  string: "String",
} as const;

const RUST_KEYWORDS = new Set([
  "as", "async", "await", "break", "const", "continue", "dyn", "else", "enum",
  "extern", "false", "fn", "for", "if", "impl", "in", "let", "loop", "match",
  "mod", "move", "mut", "pub", "ref", "return", "static", "struct", "trait",
  "true", "type", "unsafe", "use", "where", "while", "abstract", "become", "box",
  "do", "final", "macro", "override", "priv", "try", "typeof", "unsized",
  "virtual", "yield",
]);

// Keywords that cannot be written as raw identifiers
const NON_RAW_KEYWORDS = new Set(["self", "Self", "super", "crate"]);

/**
 * snake_case field identifier for a source key
 *
 * @example
 * rustFieldName("userId") // "user_id"
 * rustFieldName("type") // "r#type"
 * rustFieldName("self") // "self_"
 */
export function rustFieldName(key: string): string {
  let name = toSnakeCase(key);
  if (name.length === 0) {
    return "field";
  }
  if (/^\p{N}/u.test(name)) {
    name = `_${name}`;
  }
  if (NON_RAW_KEYWORDS.has(name)) {
    return `${name}_`;
  }
  return RUST_KEYWORDS.has(name) ? `r#${name}` : name;
}

export class RustRenderer extends BaseRenderer {
  readonly target = "rust";
  readonly displayName = "Rust (serde)";
  readonly fileExtension = ".rs";
  readonly reservedNames = [
    "Box",
    "Deserialize",
    "HashMap",
    "Option",
    "Self",
    "Serialize",
    "String",
    "Vec",
  ];
  protected readonly defaultIndentSize = 4;

  protected renderHeader(context: RenderContext): string {
    const lines: string[] = [];
    const serde = ["Deserialize", "Serialize"].filter((name) =>
      context.options.deriveMacros.includes(name),
    );
    if (serde.length > 0) {
      lines.push(`use serde::{${serde.join(", ")}};`);
    }
    if (context.uses.has("HashMap")) {
      lines.push("use std::collections::HashMap;");
    }
    return lines.join("\n");
  }

  protected renderRecord(record: RecordNode, context: RenderContext): string {
    const indent = context.indent();
    const lines: string[] = [];
    if (context.options.includeComments) {
      lines.push(`/// Inferred from \`${displayPath(record.path)}\``);
    }
    if (context.options.deriveMacros.length > 0) {
      lines.push(`#[derive(${context.options.deriveMacros.join(", ")})]`);
    }

    const name = context.typeName(record.name);
    if (record.fields.length === 0) {
      lines.push(`pub struct ${name} {}`);
      return lines.join("\n");
    }

    lines.push(`pub struct ${name} {`);
    const names = uniqueFieldNames(record, rustFieldName);
    const visibility = context.options.publicFields ? "pub " : "";

    record.fields.forEach((field, index) => {
      const identifier = names[index];
      const inner = field.type.kind === "optional" ? field.type.inner : field.type;
      let type = this.typeExpression(inner, context, true);
      if (context.isOptionalField(field) && !type.startsWith("Option<")) {
        type = `Option<${type}>`;
      }

      if (identifier.replace(/^r#/, "") !== field.name) {
        lines.push(`${indent}#[serde(rename = ${JSON.stringify(field.name)})]`);
      }
      lines.push(`${indent}${visibility}${identifier}: ${type},`);
    });

    lines.push("}");
    return lines.join("\n");
  }

  protected renderRootAlias(root: TypeNode, context: RenderContext): string {
    return `pub type ${context.rootDisplayName} = ${this.typeExpression(root, context, false)};`;
  }

  /**
   * `direct` is true while no Vec or HashMap sits between the owning struct
   * and the node; a cyclic reference in that position needs a Box
   */
  typeExpression(node: TypeNode, context: RenderContext, direct: boolean): string {
    switch (node.kind) {
      case "primitive":
        return PRIMITIVES[node.type];
      case "unknown":
        return "serde_json::Value";
      case "array":
        return `Vec<${this.typeExpression(node.element, context, false)}>`;
      case "optional": {
        const inner = this.typeExpression(node.inner, context, direct);
        return inner.startsWith("Option<") ? inner : `Option<${inner}>`;
      }
      case "map":
        context.uses.add("HashMap");
        return `HashMap<String, ${this.typeExpression(node.value, context, false)}>`;
      case "union": {
        const { nullable, rest } = splitNullable(node.variants);
        const [single] = rest;
        if (nullable && rest.length === 1 && single !== undefined) {
          const inner = this.typeExpression(single, context, direct);
          return inner.startsWith("Option<") ? inner : `Option<${inner}>`;
        }
        if (context.options.strictUnions) {
          return context.unsupported("Rust has no untagged union type", {
            variants: node.variants.map((variant) => variant.kind),
          });
        }
        return "serde_json::Value";
      }
      case "reference": {
        const name = context.typeName(node.name);
        return direct && context.isCyclic(node.name) ? `Box<${name}>` : name;
      }
      case "record":
        return context.unsupported("Inline record reached the renderer", { path: node.path });
    }
  }
}
