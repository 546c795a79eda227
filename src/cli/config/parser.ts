/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import AjvModule from "ajv";
import { parse as parseYaml } from "yaml";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";
import type { TypesmithConfigFile } from "./types.js";

const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<TypesmithConfigFile>(CONFIG_FILE_SCHEMA);

/**
 * Check parsed content against the config file schema
 *
 * @throws ConfigError listing every violation
 */
export function validateConfigContent(
  content: unknown,
  source: string = "<config>",
): TypesmithConfigFile {
  // An empty YAML file parses to null
  if (content === null || content === undefined) {
    return {};
  }

  if (!validateConfigFile(content)) {
    const errors = (validateConfigFile.errors ?? []).map(
      (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
    );
    throw new ConfigError(`Invalid config file: ${source}`, { errors });
  }

  return content;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): TypesmithConfigFile {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let content: unknown;
  try {
    content = isYaml ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = validateConfigContent(content, filePath);
  logger.info("Configuration file parsed successfully", {
    hasInference: config.inference !== undefined,
    hasRender: config.render !== undefined,
  });
  return config;
}
