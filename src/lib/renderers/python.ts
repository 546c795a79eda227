/**
 * Python renderer - pydantic v2 models
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
  null: "None",
  bool: "bool",
  int: "int",
  float: "float",
  string: "str",
} as const;

const PYTHON_KEYWORDS = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await", "break",
  "class", "continue", "def", "del", "elif", "else", "except", "finally", "for",
  "from", "global", "if", "import", "in", "is", "lambda", "nonlocal", "not",
  "or", "pass", "raise", "return", "try", "while", "with", "yield",
]);

// BaseModel attributes a field must not shadow
const RESERVED_ATTRIBUTES = new Set([
  "copy", "dict", "json", "schema", "construct", "validate", "fields",
]);

/**
 * snake_case attribute for a source key
 *
 * @example
 * pythonFieldName("firstName") // "first_name"
 * pythonFieldName("class") // "class_"
 * pythonFieldName("2fa") // "field_2fa"
 */
export function pythonFieldName(key: string): string {
  let name = toSnakeCase(key);
  if (name.length === 0) {
    return "field";
  }
  if (/^\p{N}/u.test(name)) {
    name = `field_${name}`;
  }
  if (
    PYTHON_KEYWORDS.has(name) ||
    RESERVED_ATTRIBUTES.has(name) ||
    name.startsWith("model_")
  ) {
    name = `${name}_`;
  }
  return name;
}

export class PythonRenderer extends BaseRenderer {
  readonly target = "python";
  readonly displayName = "Python (pydantic)";
  readonly fileExtension = ".py";
  readonly reservedNames = [
    "Any",
    "BaseModel",
    "Dict",
    "Field",
    "List",
    "Optional",
    "RootModel",
    "Union",
  ];
  protected readonly defaultIndentSize = 4;
  protected readonly blockSeparator = "\n\n\n";

  protected renderHeader(context: RenderContext): string {
    const lines = ["from __future__ import annotations"];

    const typing = [...context.uses].filter((name) => !name.startsWith("pydantic.")).sort();
    if (typing.length > 0) {
      lines.push("", `from typing import ${typing.join(", ")}`);
    }

    const pydantic = ["BaseModel"];
    for (const name of ["Field", "RootModel"]) {
      if (context.uses.has(`pydantic.${name}`)) {
        pydantic.push(name);
      }
    }
    lines.push("", `from pydantic import ${pydantic.join(", ")}`);
    return lines.join("\n");
  }

  protected renderRecord(record: RecordNode, context: RenderContext): string {
    const indent = context.indent();
    const lines = [`class ${context.typeName(record.name)}(BaseModel):`];
    if (context.options.includeComments) {
      lines.push(`${indent}"""Inferred from \`${displayPath(record.path)}\`."""`);
    }

    if (record.fields.length === 0) {
      if (!context.options.includeComments) {
        lines.push(`${indent}pass`);
      }
      return lines.join("\n");
    }

    if (context.options.includeComments) {
      lines.push("");
    }

    const names = uniqueFieldNames(record, pythonFieldName);
    record.fields.forEach((field, index) => {
      const name = names[index];
      const optionalField = context.isOptionalField(field);
      const inner = field.type.kind === "optional" ? field.type.inner : field.type;
      let annotation = this.typeExpression(inner, context);
      if (optionalField && !annotation.startsWith("Optional[")) {
        context.uses.add("Optional");
        annotation = `Optional[${annotation}]`;
      }

      let line = `${indent}${name}: ${annotation}`;
      if (name !== field.name) {
        context.uses.add("pydantic.Field");
        const alias = JSON.stringify(field.name);
        line += optionalField
          ? ` = Field(default=None, alias=${alias})`
          : ` = Field(alias=${alias})`;
      } else if (optionalField) {
        line += " = None";
      }
      lines.push(line);
    });

    return lines.join("\n");
  }

  protected renderRootAlias(root: TypeNode, context: RenderContext): string {
    context.uses.add("pydantic.RootModel");
    return [
      `class ${context.rootDisplayName}(RootModel[${this.typeExpression(root, context)}]):`,
      `${context.indent()}pass`,
    ].join("\n");
  }

  typeExpression(node: TypeNode, context: RenderContext): string {
    switch (node.kind) {
      case "primitive":
        return PRIMITIVES[node.type];
      case "unknown":
        context.uses.add("Any");
        return "Any";
      case "array":
        context.uses.add("List");
        return `List[${this.typeExpression(node.element, context)}]`;
      case "optional": {
        const inner = this.typeExpression(node.inner, context);
        if (inner.startsWith("Optional[")) {
          return inner;
        }
        context.uses.add("Optional");
        return `Optional[${inner}]`;
      }
      case "map":
        context.uses.add("Dict");
        return `Dict[str, ${this.typeExpression(node.value, context)}]`;
      case "union": {
        const { nullable, rest } = splitNullable(node.variants);
        const members = rest.map((variant) => this.typeExpression(variant, context));
        let expression = members[0] ?? "None";
        if (members.length > 1) {
          context.uses.add("Union");
          expression = `Union[${members.join(", ")}]`;
        }
        if (nullable) {
          context.uses.add("Optional");
          return `Optional[${expression}]`;
        }
        return expression;
      }
      case "reference":
        return context.typeName(node.name);
      case "record":
        return context.unsupported("Inline record reached the renderer", { path: node.path });
    }
  }
}
