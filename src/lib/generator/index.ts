/**
 * Generator module - samples to source code
 */

import type { GenerateOptions } from "../../types/config.js";
import type { TypeGraph } from "../../types/type-graph.js";
import type { Value } from "../../types/value.js";
import { TypesmithError } from "../../utils/errors.js";
import { infer } from "../inferencer/index.js";
import { finalize } from "../namer/index.js";
import { getRenderer, reservedTypeNames, type LanguageRenderer } from "../renderers/index.js";
import type { TargetOutcome } from "./types.js";

export type { TargetOutcome } from "./types.js";

/**
 * Infer and finalize the named type graph for a set of samples
 *
 * @throws InferenceError when `samples` is empty
 */
export function buildTypeGraph(
  samples: readonly Value[],
  rootName: string,
  options: GenerateOptions = {},
): TypeGraph {
  const raw = infer(samples, rootName, options.inference);
  return finalize(raw, raw.rootName, reservedTypeNames());
}

/**
 * Generate source code for `target` describing every sample
 *
 * The target is resolved before any inference runs, so an unknown target
 * fails fast even for empty input.
 *
 * @throws UnregisteredTargetError, InferenceError, NamingCollisionError,
 * UnsupportedConstructError
 *
 * @example
 * generate([{ id: 1, name: "a" }, { id: 2 }], "User", "typescript");
 * // export interface User {
 * //   id: number;
 * //   name?: string;
 * // }
 */
export function generate(
  samples: readonly Value[],
  rootName: string,
  target: string,
  options: GenerateOptions = {},
): string {
  const renderer = getRenderer(target);
  const graph = buildTypeGraph(samples, rootName, options);
  return renderer.render(graph, options.render);
}

/**
 * Infer once and render every target. Render failures are reported per
 * target; inference failures and unknown targets still throw.
 */
export function generateMany(
  samples: readonly Value[],
  rootName: string,
  targets: readonly string[],
  options: GenerateOptions = {},
): TargetOutcome[] {
  const renderers: LanguageRenderer[] = targets.map((target) => getRenderer(target));
  const graph = buildTypeGraph(samples, rootName, options);

  return renderers.map((renderer): TargetOutcome => {
    try {
      return { ok: true, target: renderer.target, source: renderer.render(graph, options.render) };
    } catch (error) {
      if (error instanceof TypesmithError) {
        return { ok: false, target: renderer.target, error };
      }
      throw error;
    }
  });
}
