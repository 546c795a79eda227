/**
 * CLI configuration types
 */

import type {
  InferenceOptions,
  RenderOptions,
} from "../../types/config.js";
import type { InputFormat } from "../../types/value.js";

/**
 * Configuration file structure (JSON or YAML)
 */
export interface TypesmithConfigFile {
  rootName?: string;
  target?: string;
  inputFormat?: InputFormat;
  inference?: Partial<InferenceOptions>;
  render?: Partial<Omit<RenderOptions, "rootName">>;
}

/**
 * CLI command options (from commander)
 */
export interface GenerateCommandOptions {
  inputFormat?: string;
  target?: string;
  rootName?: string;
  output?: string;
  config?: string;
  mapThreshold?: number;
  maxMapValueVariants?: number;
  /** false when --no-key-patterns is given */
  keyPatterns?: boolean;
  includeComments?: boolean;
  indentStyle?: string;
  indentSize?: number;
  readonly?: boolean;
  optionalFields?: boolean;
  derive?: string; // Comma-separated
  /** false when --no-public-fields is given */
  publicFields?: boolean;
  strictUnions?: boolean;
  quiet?: boolean;
  logLevel?: string;
  listTargets?: boolean;
}
