/**
 * typesmith - infer type definitions from JSON, YAML and TOML samples
 */

export * from "./types/index.js";
export * from "./utils/errors.js";
export { logger, createLogger, type LogLevel, type Logger } from "./utils/logger.js";
export { loadGenerateConfig, type ResolvedGenerateConfig } from "./utils/config-loader.js";

export { parse, parseSamples, toValue, detectFormat } from "./lib/parser/index.js";
export { infer, inferValue, unify, unifyAll, typeEquals } from "./lib/inferencer/index.js";
export { finalize } from "./lib/namer/index.js";
export { order, assemble, findCyclicRecords, type Assembly } from "./lib/assembler/index.js";
export {
  getRenderer,
  listTargets,
  resolveTarget,
  isRegisteredTarget,
  reservedTypeNames,
  BaseRenderer,
  TypeScriptRenderer,
  ZodRenderer,
  PythonRenderer,
  RustRenderer,
  type LanguageRenderer,
  type TargetName,
} from "./lib/renderers/index.js";
export {
  generate,
  generateMany,
  buildTypeGraph,
  type TargetOutcome,
} from "./lib/generator/index.js";
export {
  computeStats,
  complexityScore,
  complexityLabel,
  formatBytes,
  buildReport,
  type ConversionStats,
  type ConversionReport,
} from "./lib/reporter/index.js";
