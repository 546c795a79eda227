/**
 * Main CLI program definition
 */

import { Command } from "commander";
import { createGenerateCommand } from "./commands/generate.js";

const pkg = {
  name: "typesmith",
  version: "0.1.0",
  description: "Infer type definitions from JSON, YAML and TOML samples",
};

/**
 * `generate` runs when no command is named
 */
export function createProgram(): Command {
  const program = new Command();

  program.name(pkg.name).description(pkg.description).version(pkg.version);
  program.addCommand(createGenerateCommand(), { isDefault: true });

  return program;
}
