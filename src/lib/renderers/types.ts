/**
 * Generator contract
 */

import type { RenderOptions } from "../../types/config.js";
import type { TypeGraph } from "../../types/type-graph.js";

export type TargetName = "typescript" | "zod" | "python" | "rust";

/**
 * Implemented once per target language. render() reads the graph only; the
 * same graph may be rendered by several renderers.
 */
export interface LanguageRenderer {
  readonly target: TargetName;
  readonly displayName: string;
  readonly fileExtension: string;
  /** Type names the emitted code refers to; no record may take one */
  readonly reservedNames: readonly string[];

  /**
   * @throws UnsupportedConstructError when the target cannot represent a node
   */
  render(graph: TypeGraph, options?: Partial<RenderOptions>): string;
}

export interface ResolvedRenderOptions extends RenderOptions {
  indentSize: number;
}
