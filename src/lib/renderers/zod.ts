/**
 * Zod renderer - a schema constant plus an inferred type per record
 */

import type { RecordNode, TypeNode } from "../../types/type-graph.js";
import { isPlainIdentifier } from "../../utils/naming.js";
import { BaseRenderer, displayPath, type RenderContext } from "./base.js";
import { TypeScriptRenderer } from "./typescript.js";

const PRIMITIVES = {
  null: "z.null()",
  bool: "z.boolean()",
  int: "z.number().int()",
  float: "z.number()",
  string: "z.string()",
} as const;

export class ZodRenderer extends BaseRenderer {
  readonly target = "zod";
  readonly displayName = "Zod";
  readonly fileExtension = ".ts";
  readonly reservedNames = ["Array", "Record"];
  protected readonly defaultIndentSize = 2;
  private readonly types = new TypeScriptRenderer();

  protected renderHeader(): string {
    return 'import { z } from "zod";';
  }

  protected renderRecord(record: RecordNode, context: RenderContext): string {
    const name = context.typeName(record.name);
    const lines: string[] = [];
    if (context.options.includeComments) {
      lines.push(`// Inferred from ${displayPath(record.path)}`);
    }

    // A recursive schema cannot infer its own type, so it is declared first
    const cyclic = context.isCyclic(record.name);
    const annotation = cyclic ? `: z.ZodType<${name}>` : "";
    if (cyclic) {
      lines.push(this.types.interfaceDeclaration(record, context));
    }

    if (record.fields.length === 0) {
      lines.push(`export const ${schemaName(name)}${annotation} = z.object({});`);
    } else {
      lines.push(`export const ${schemaName(name)}${annotation} = z.object({`);
      for (const field of record.fields) {
        const key = isPlainIdentifier(field.name) ? field.name : JSON.stringify(field.name);
        const type = field.type.kind === "optional" ? field.type.inner : field.type;
        const suffix = context.isOptionalField(field) ? ".optional()" : "";
        lines.push(`${context.indent()}${key}: ${this.schemaExpression(type, context)}${suffix},`);
      }
      lines.push("});");
    }

    if (!cyclic) {
      lines.push(`export type ${name} = z.infer<typeof ${schemaName(name)}>;`);
    }
    return lines.join("\n");
  }

  protected renderRootAlias(root: TypeNode, context: RenderContext): string {
    const name = context.rootDisplayName;
    return [
      `export const ${schemaName(name)} = ${this.schemaExpression(root, context)};`,
      `export type ${name} = z.infer<typeof ${schemaName(name)}>;`,
    ].join("\n");
  }

  schemaExpression(node: TypeNode, context: RenderContext): string {
    switch (node.kind) {
      case "primitive":
        return PRIMITIVES[node.type];
      case "unknown":
        return "z.unknown()";
      case "array":
        return `z.array(${this.schemaExpression(node.element, context)})`;
      case "optional":
        return `${this.schemaExpression(node.inner, context)}.optional()`;
      case "map":
        return `z.record(z.string(), ${this.schemaExpression(node.value, context)})`;
      case "union": {
        const variants = node.variants.map((variant) => this.schemaExpression(variant, context));
        return `z.union([${variants.join(", ")}])`;
      }
      case "reference": {
        const schema = schemaName(context.typeName(node.name));
        return context.declared.has(node.name) ? schema : `z.lazy(() => ${schema})`;
      }
      case "record":
        return context.unsupported("Inline record reached the renderer", { path: node.path });
    }
  }
}

function schemaName(typeName: string): string {
  return `${typeName}Schema`;
}
