/**
 * Generate command - infer types from sample files and emit source code
 */

import { Command } from "commander";
import { buildTypeGraph } from "../../lib/generator/index.js";
import { listTargets, getRenderer } from "../../lib/renderers/index.js";
import { buildReport } from "../../lib/reporter/index.js";
import { loadGenerateConfig } from "../../utils/config-loader.js";
import {
  ConfigError,
  ErrorCode,
  FileIOError,
  toTypesmithError,
  type TypesmithError,
} from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { GenerateCommandOptions } from "../config/types.js";
import { loadSamples, processIO, type CommandIO } from "../io.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE_ERRORS = new Set<ErrorCode>([
  ErrorCode.CONFIG_ERROR,
  ErrorCode.UNREGISTERED_TARGET,
]);

export function exitCodeFor(error: TypesmithError): number {
  return USAGE_ERRORS.has(error.code) ? EXIT_USAGE : EXIT_FAILURE;
}

/**
 * Execute generate command and return the process exit code
 */
export async function runGenerate(
  inputs: string[],
  options: GenerateCommandOptions,
  io: CommandIO = processIO,
): Promise<number> {
  const startTime = Date.now();

  try {
    if (options.logLevel !== undefined) {
      if (!isLogLevel(options.logLevel)) {
        throw new ConfigError(`Unknown log level: ${options.logLevel}`);
      }
      logger.setLevel(options.logLevel);
    }

    if (options.listTargets) {
      io.stdout(listTargets().join("\n") + "\n");
      return EXIT_SUCCESS;
    }

    const configFile = options.config ? parseConfigFile(options.config) : undefined;
    const config = loadGenerateConfig(options, configFile);

    // Fail on an unknown target before touching any input
    const renderer = getRenderer(config.target);

    const { samples, bytes } = await loadSamples(inputs, config.inputFormat, io);
    logger.info("Starting generation", {
      target: renderer.target,
      rootName: config.rootName,
      samples: samples.length,
    });

    // Parsed samples carry integers as bigint
    const graph = buildTypeGraph(samples, config.rootName, {
      inference: { ...config.inference, integersAsBigInt: true },
    });
    const source = renderer.render(graph, config.render);

    if (options.output) {
      const outputPath = options.output;
      await io.writeFile(outputPath, source).catch((error: unknown) => {
        throw new FileIOError(`Failed to write output: ${outputPath}`, { path: outputPath }, {
          cause: error,
        });
      });
      logger.info("Output written", { path: options.output });
    } else {
      io.stdout(source);
    }

    if (!options.quiet) {
      const report = buildReport(graph, renderer.target, {
        durationMs: Date.now() - startTime,
        inputSize: bytes,
        outputSize: Buffer.byteLength(source, "utf-8"),
      });
      io.stderr(JSON.stringify({ status: "success", ...report }, null, 2) + "\n");
    }

    return EXIT_SUCCESS;
  } catch (error) {
    const typed = toTypesmithError(error);
    logger.debug("Generation failed", { code: typed.code });
    io.stderr(JSON.stringify(typed.toResponse("generate"), null, 2) + "\n");
    return exitCodeFor(typed);
  }
}

const parseInteger = (value: string): number => parseInt(value, 10);

/**
 * Create generate command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Infer types from JSON, YAML or TOML samples and emit source code")
    .argument("[inputs...]", 'Sample files; "-" or none reads stdin')
    .option("-f, --input-format <format>", "Input format: json, ndjson, yaml, toml (default: from extension)")
    .option("-t, --target <target>", "Target language: typescript, zod, python, rust")
    .option("-n, --root-name <name>", "Name of the root type")
    .option("-o, --output <path>", "Write generated source to a file instead of stdout")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option(
      "--map-threshold <count>",
      "Key count an object must exceed to become a map (default: 4)",
      parseInteger,
    )
    .option(
      "--max-map-value-variants <count>",
      "Largest union of value types a map may hold (default: 1)",
      parseInteger,
    )
    .option("--no-key-patterns", "Disable id-like key pattern detection for maps")
    .option("--include-comments", "Annotate types with their source path")
    .option("--indent-style <style>", "Indentation: spaces, tabs")
    .option("--indent-size <count>", "Spaces per indentation level", parseInteger)
    .option("--readonly", "typescript: emit readonly properties")
    .option("--optional-fields", "Mark every field optional")
    .option("--derive <macros>", "rust: derive list (comma-separated)")
    .option("--no-public-fields", "rust: emit private struct fields")
    .option("--strict-unions", "rust: fail on unions instead of using serde_json::Value")
    .option("-q, --quiet", "Do not print the conversion report")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .option("--list-targets", "List registered targets and exit")
    .action(async (inputs: string[], options: GenerateCommandOptions) => {
      process.exitCode = await runGenerate(inputs, options);
    });
}
