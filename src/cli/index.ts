#!/usr/bin/env node

/**
 * typesmith CLI - infer types from JSON, YAML and TOML samples
 */

import { createProgram } from "./program.js";
import { logger } from "../utils/logger.js";

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      { status: "error", error: { code: "UNEXPECTED_ERROR", message } },
      null,
      2,
    ),
  );
  process.exit(1);
});
