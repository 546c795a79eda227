/**
 * Renderer registry
 */

import { UnregisteredTargetError } from "../../utils/errors.js";
import { PythonRenderer } from "./python.js";
import { RustRenderer } from "./rust.js";
import type { LanguageRenderer, TargetName } from "./types.js";
import { TypeScriptRenderer } from "./typescript.js";
import { ZodRenderer } from "./zod.js";

export type { LanguageRenderer, ResolvedRenderOptions, TargetName } from "./types.js";
export { BaseRenderer, RenderContext, displayPath } from "./base.js";
export { TypeScriptRenderer } from "./typescript.js";
export { ZodRenderer } from "./zod.js";
export { PythonRenderer, pythonFieldName } from "./python.js";
export { RustRenderer, rustFieldName } from "./rust.js";

const RENDERERS: ReadonlyMap<TargetName, LanguageRenderer> = new Map<TargetName, LanguageRenderer>([
  ["typescript", new TypeScriptRenderer()],
  ["zod", new ZodRenderer()],
  ["python", new PythonRenderer()],
  ["rust", new RustRenderer()],
]);

const TARGET_ALIASES: ReadonlyMap<string, TargetName> = new Map<string, TargetName>([
  ["ts", "typescript"],
  ["py", "python"],
  ["rs", "rust"],
]);

export function listTargets(): TargetName[] {
  return [...RENDERERS.keys()];
}

/**
 * Canonical target name for a name or alias, case-insensitive
 *
 * @throws UnregisteredTargetError
 */
export function resolveTarget(name: string): TargetName {
  const lower = name.trim().toLowerCase();
  const aliased = TARGET_ALIASES.get(lower);
  if (aliased !== undefined) {
    return aliased;
  }
  for (const target of RENDERERS.keys()) {
    if (target === lower) {
      return target;
    }
  }
  throw new UnregisteredTargetError(name, listTargets());
}

/**
 * Every type name some registered target relies on, so one graph renders
 * cleanly for all of them
 */
export function reservedTypeNames(): string[] {
  const names = new Set<string>();
  for (const renderer of RENDERERS.values()) {
    renderer.reservedNames.forEach((name) => names.add(name));
  }
  return [...names].sort();
}

export function getRenderer(name: string): LanguageRenderer {
  const renderer = RENDERERS.get(resolveTarget(name));
  if (!renderer) {
    throw new UnregisteredTargetError(name, listTargets());
  }
  return renderer;
}

export function isRegisteredTarget(name: string): boolean {
  const lower = name.trim().toLowerCase();
  return TARGET_ALIASES.has(lower) || listTargets().some((target) => target === lower);
}
