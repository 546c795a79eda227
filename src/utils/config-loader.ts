/**
 * Configuration loader for the generate command
 */

import type { TypesmithConfigFile, GenerateCommandOptions } from "../cli/config/types.js";
import {
  DEFAULT_INFERENCE_OPTIONS,
  DEFAULT_RENDER_OPTIONS,
  type IndentStyle,
  type InferenceOptions,
  type RenderOptions,
} from "../types/config.js";
import { isInputFormat, type InputFormat } from "../types/value.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_ROOT_NAME = "Root";
export const DEFAULT_TARGET = "typescript";
export const DEFAULT_INPUT_FORMAT: InputFormat = "json";

const MAX_INDENT_SIZE = 8;

/**
 * Fully merged configuration for one generate run
 */
export interface ResolvedGenerateConfig {
  rootName: string;
  target: string;
  /** Input format from flags or file; undefined means detect per input */
  inputFormat?: InputFormat;
  inference: InferenceOptions;
  render: RenderOptions;
}

function isIndentStyle(value: string): value is IndentStyle {
  return value === "spaces" || value === "tabs";
}

function parseList(value: string | undefined): string[] | undefined {
  return value
    ?.split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Drop undefined entries so they do not shadow lower-precedence values
 */
function defined<T extends object>(values: T): { [k: string]: unknown } {
  return Object.fromEntries(
    Object.entries(values).filter(([_, value]) => value !== undefined),
  );
}

/**
 * Merge CLI options, config file and defaults (in that precedence order)
 *
 * @throws ConfigError for invalid values
 *
 * @example
 * const config = loadGenerateConfig({ mapThreshold: 10 }, { inference: { mapThreshold: 6 } });
 * // config.inference.mapThreshold === 10
 */
export function loadGenerateConfig(
  cliOptions: GenerateCommandOptions = {},
  configFile: TypesmithConfigFile = {},
): ResolvedGenerateConfig {
  const inputFormat = cliOptions.inputFormat ?? configFile.inputFormat;
  if (inputFormat !== undefined && !isInputFormat(inputFormat)) {
    throw new ConfigError(`Unsupported input format: ${inputFormat}`, {
      inputFormat,
    });
  }

  const indentStyle = cliOptions.indentStyle;
  if (indentStyle !== undefined && !isIndentStyle(indentStyle)) {
    throw new ConfigError(`Indent style must be "spaces" or "tabs", got ${indentStyle}`);
  }

  const inference: InferenceOptions = {
    ...DEFAULT_INFERENCE_OPTIONS,
    ...configFile.inference,
    ...defined({
      mapThreshold: cliOptions.mapThreshold,
      maxMapValueVariants: cliOptions.maxMapValueVariants,
      // commander defaults negatable flags to true, so only false is an override
      detectKeyPatterns: cliOptions.keyPatterns === false ? false : undefined,
    }),
  };

  const render: RenderOptions = {
    ...DEFAULT_RENDER_OPTIONS,
    ...configFile.render,
    ...defined({
      indentStyle,
      indentSize: cliOptions.indentSize,
      includeComments: cliOptions.includeComments,
      readonly: cliOptions.readonly,
      optionalFields: cliOptions.optionalFields,
      deriveMacros: parseList(cliOptions.derive),
      publicFields: cliOptions.publicFields === false ? false : undefined,
      strictUnions: cliOptions.strictUnions,
    }),
  };

  const config: ResolvedGenerateConfig = {
    rootName: cliOptions.rootName ?? configFile.rootName ?? DEFAULT_ROOT_NAME,
    target: cliOptions.target ?? configFile.target ?? DEFAULT_TARGET,
    inputFormat,
    inference,
    render,
  };

  validateGenerateConfig(config);

  logger.debug("Generate config loaded", {
    rootName: config.rootName,
    target: config.target,
    mapThreshold: inference.mapThreshold,
    patternsCount: inference.patterns.length,
  });

  return config;
}

/**
 * Validate merged generate configuration
 *
 * @throws ConfigError describing the first problem found
 */
export function validateGenerateConfig(config: ResolvedGenerateConfig): void {
  const { inference, render } = config;

  if (config.rootName.trim().length === 0) {
    throw new ConfigError("Root name must not be empty");
  }

  if (!Number.isInteger(inference.mapThreshold) || inference.mapThreshold < 0) {
    throw new ConfigError(
      `Map threshold must be an integer >= 0, got ${inference.mapThreshold}`,
    );
  }

  if (
    !Number.isInteger(inference.maxMapValueVariants) ||
    inference.maxMapValueVariants < 1
  ) {
    throw new ConfigError(
      `maxMapValueVariants must be an integer >= 1, got ${inference.maxMapValueVariants}`,
    );
  }

  if (!Number.isInteger(inference.minPatternKeys) || inference.minPatternKeys < 1) {
    throw new ConfigError(
      `minPatternKeys must be an integer >= 1, got ${inference.minPatternKeys}`,
    );
  }

  if (
    render.indentSize !== undefined &&
    (!Number.isInteger(render.indentSize) ||
      render.indentSize < 1 ||
      render.indentSize > MAX_INDENT_SIZE)
  ) {
    throw new ConfigError(
      `Indent size must be an integer between 1 and ${MAX_INDENT_SIZE}, got ${render.indentSize}`,
    );
  }

  // Validate pattern names are unique and compile
  const patternNames = new Set<string>();
  for (const pattern of inference.patterns) {
    if (patternNames.has(pattern.name)) {
      throw new ConfigError(`Duplicate pattern name: ${pattern.name}`);
    }
    patternNames.add(pattern.name);

    try {
      new RegExp(pattern.regex);
    } catch (error) {
      throw new ConfigError(
        `Invalid regex pattern for ${pattern.name}: ${pattern.regex}`,
        { pattern: pattern.name },
        { cause: error },
      );
    }
  }

  // Validate path lists don't overlap
  const mapPaths = new Set(inference.forceMapPaths);
  for (const path of inference.forceRecordPaths) {
    if (mapPaths.has(path)) {
      throw new ConfigError(
        `Path cannot be in both forceMapPaths and forceRecordPaths: ${path}`,
        { path },
      );
    }
  }
}
