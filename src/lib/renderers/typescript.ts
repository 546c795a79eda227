/**
 * TypeScript renderer - one exported interface per record
 */

import type { RecordNode, TypeNode } from "../../types/type-graph.js";
import { isPlainIdentifier } from "../../utils/naming.js";
import { BaseRenderer, displayPath, type RenderContext } from "./base.js";

const PRIMITIVES = {
  null: "null",
  bool: "boolean",
  int: "number",
  float: "number",
  string: "string",
} as const;

export class TypeScriptRenderer extends BaseRenderer {
  readonly target = "typescript";
  readonly displayName = "TypeScript";
  readonly fileExtension = ".ts";
  readonly reservedNames = ["Array", "Partial", "Readonly", "Record"];
  protected readonly defaultIndentSize = 2;

  protected renderHeader(): string {
    return "";
  }

  protected renderRecord(record: RecordNode, context: RenderContext): string {
    const lines: string[] = [];
    if (context.options.includeComments) {
      lines.push(`/** Inferred from \`${displayPath(record.path)}\` */`);
    }
    lines.push(this.interfaceDeclaration(record, context));
    return lines.join("\n");
  }

  /**
   * `export interface` for a record; also used for recursive Zod schemas
   */
  interfaceDeclaration(record: RecordNode, context: RenderContext): string {
    const name = context.typeName(record.name);
    if (record.fields.length === 0) {
      return `export interface ${name} {}`;
    }

    const lines = [`export interface ${name} {`];
    for (const field of record.fields) {
      const key = isPlainIdentifier(field.name) ? field.name : JSON.stringify(field.name);
      const modifier = context.options.readonly ? "readonly " : "";
      const marker = context.isOptionalField(field) ? "?" : "";
      const type = field.type.kind === "optional" ? field.type.inner : field.type;
      lines.push(`${context.indent()}${modifier}${key}${marker}: ${this.typeExpression(type, context)};`);
    }
    lines.push("}");
    return lines.join("\n");
  }

  protected renderRootAlias(root: TypeNode, context: RenderContext): string {
    return `export type ${context.rootDisplayName} = ${this.typeExpression(root, context)};`;
  }

  typeExpression(node: TypeNode, context: RenderContext): string {
    switch (node.kind) {
      case "primitive":
        return PRIMITIVES[node.type];
      case "unknown":
        return "unknown";
      case "array": {
        const element = this.typeExpression(node.element, context);
        return needsParentheses(node.element) ? `(${element})[]` : `${element}[]`;
      }
      case "optional":
        return `${this.typeExpression(node.inner, context)} | undefined`;
      case "map":
        return `Record<string, ${this.typeExpression(node.value, context)}>`;
      case "union":
        return node.variants.map((variant) => this.typeExpression(variant, context)).join(" | ");
      case "reference":
        return context.typeName(node.name);
      case "record":
        return context.unsupported("Inline record reached the renderer", { path: node.path });
    }
  }
}

function needsParentheses(node: TypeNode): boolean {
  return node.kind === "union" || node.kind === "optional";
}
