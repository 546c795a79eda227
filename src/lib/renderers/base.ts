/**
 * Shared rendering machinery
 */

import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from "../../types/config.js";
import type {
  RecordField,
  RecordNode,
  TypeGraph,
  TypeNode,
} from "../../types/type-graph.js";
import { NamingCollisionError, UnsupportedConstructError } from "../../utils/errors.js";
import { assemble, type Assembly } from "../assembler/index.js";
import type { LanguageRenderer, ResolvedRenderOptions, TargetName } from "./types.js";

/**
 * Per-render state: resolved options, declaration order, and what the body
 * has used so far (for import lists)
 */
export class RenderContext {
  readonly assembly: Assembly;
  readonly rootDisplayName: string;
  readonly declared = new Set<string>();
  readonly uses = new Set<string>();

  constructor(
    readonly graph: TypeGraph,
    readonly options: ResolvedRenderOptions,
    readonly target: TargetName,
  ) {
    this.assembly = assemble(graph);
    this.rootDisplayName = options.rootName ?? graph.rootName;

    if (
      this.rootDisplayName !== graph.rootName &&
      graph.records.has(this.rootDisplayName)
    ) {
      throw new NamingCollisionError(
        `Root name override "${this.rootDisplayName}" collides with a generated type`,
        { rootName: this.rootDisplayName, target },
      );
    }
  }

  /**
   * Name to print for a record, applying the root override
   */
  typeName(name: string): string {
    return name === this.graph.rootName ? this.rootDisplayName : name;
  }

  indent(level: number = 1): string {
    const unit = this.options.indentStyle === "tabs" ? "\t" : " ".repeat(this.options.indentSize);
    return unit.repeat(level);
  }

  isCyclic(name: string): boolean {
    return this.assembly.cyclic.has(name);
  }

  isOptionalField(field: RecordField): boolean {
    return this.options.optionalFields || field.type.kind === "optional";
  }

  unsupported(message: string, details?: Record<string, unknown>): never {
    throw new UnsupportedConstructError(this.target, message, details);
  }
}

/**
 * Value path in `$`-rooted notation
 *
 * @example
 * displayPath("users[].address") // "$.users[].address"
 * displayPath("") // "$"
 */
export function displayPath(path: string): string {
  if (path === "") {
    return "$";
  }
  return path.startsWith("[") ? `$${path}` : `$.${path}`;
}

/**
 * Target identifiers for every field of a record, made unique within it
 */
export function uniqueFieldNames(
  record: RecordNode,
  toIdentifier: (key: string) => string,
): string[] {
  const used = new Set<string>();
  return record.fields.map((field) => {
    const base = toIdentifier(field.name);
    let candidate = base;
    let counter = 1;
    while (used.has(candidate)) {
      counter++;
      candidate = `${base}_${counter}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/**
 * Split a union into its null member and the remaining variants
 */
export function splitNullable(variants: TypeNode[]): {
  nullable: boolean;
  rest: TypeNode[];
} {
  const rest = variants.filter(
    (variant) => !(variant.kind === "primitive" && variant.type === "null"),
  );
  return { nullable: rest.length !== variants.length, rest };
}

export function resolveRenderOptions(
  options: Partial<RenderOptions>,
  defaultIndentSize: number,
): ResolvedRenderOptions {
  const merged = { ...DEFAULT_RENDER_OPTIONS, ...options };
  return { ...merged, indentSize: merged.indentSize ?? defaultIndentSize };
}

/**
 * Template for renderers: declarations in assembler order, then a root alias
 * when the root is not itself a record, then the header computed from what
 * the body used
 */
export abstract class BaseRenderer implements LanguageRenderer {
  abstract readonly target: TargetName;
  abstract readonly displayName: string;
  abstract readonly fileExtension: string;
  abstract readonly reservedNames: readonly string[];
  protected abstract readonly defaultIndentSize: number;
  protected readonly blockSeparator: string = "\n\n";

  render(graph: TypeGraph, options: Partial<RenderOptions> = {}): string {
    const context = new RenderContext(
      graph,
      resolveRenderOptions(options, this.defaultIndentSize),
      this.target,
    );
    this.checkReservedNames(context);

    const blocks: string[] = [];
    for (const record of context.assembly.records) {
      blocks.push(this.renderRecord(record, context));
      context.declared.add(record.name);
    }

    if (!(graph.root.kind === "reference" && graph.root.name === graph.rootName)) {
      blocks.push(this.renderRootAlias(graph.root, context));
    }

    const header = this.renderHeader(context);
    return [header, ...blocks].filter((block) => block.length > 0).join(this.blockSeparator) + "\n";
  }

  private checkReservedNames(context: RenderContext): void {
    const names = [...context.graph.records.keys()].map((name) => context.typeName(name));
    names.push(context.rootDisplayName);
    const clash = names.find((name) => this.reservedNames.includes(name));
    if (clash !== undefined) {
      throw new NamingCollisionError(
        `Type name "${clash}" shadows a name ${this.displayName} output relies on`,
        { name: clash, target: this.target },
      );
    }
  }

  protected abstract renderHeader(context: RenderContext): string;
  protected abstract renderRecord(record: RecordNode, context: RenderContext): string;
  protected abstract renderRootAlias(root: TypeNode, context: RenderContext): string;
}
