/**
 * Process streams used by the CLI, replaceable in tests
 */

import { readFile, writeFile } from "fs/promises";
import { text } from "stream/consumers";
import type { Value, InputFormat } from "../types/value.js";
import { parseSamples, detectFormat } from "../lib/parser/index.js";
import { FileIOError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export interface CommandIO {
  readStdin(): Promise<string>;
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  stdout(content: string): void;
  stderr(content: string): void;
}

export const processIO: CommandIO = {
  readStdin: () => text(process.stdin),
  readFile: (path) => readFile(path, "utf-8"),
  writeFile: (path, content) => writeFile(path, content, "utf-8"),
  stdout: (content) => {
    process.stdout.write(content);
  },
  stderr: (content) => {
    process.stderr.write(content);
  },
};

export interface LoadedSamples {
  samples: Value[];
  /** Total bytes read */
  bytes: number;
}

const STDIN = "-";

/**
 * Read and parse every input; no inputs means stdin
 */
export async function loadSamples(
  inputs: readonly string[],
  format: InputFormat | undefined,
  io: CommandIO,
): Promise<LoadedSamples> {
  const sources = inputs.length > 0 ? inputs : [STDIN];
  const samples: Value[] = [];
  let bytes = 0;

  for (const source of sources) {
    let content: string;
    try {
      content = source === STDIN ? await io.readStdin() : await io.readFile(source);
    } catch (error) {
      throw new FileIOError(`Failed to read input: ${source}`, { source }, { cause: error });
    }

    bytes += Buffer.byteLength(content, "utf-8");
    const parsed = parseSamples(
      content,
      format ?? detectFormat(source, "json"),
      source === STDIN ? "<stdin>" : source,
    );
    samples.push(...parsed);
    logger.info("Input loaded", { source, samples: parsed.length });
  }

  return { samples, bytes };
}
