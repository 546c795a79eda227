/**
 * Reporter module types
 */

export type ComplexityLabel = "Simple" | "Moderate" | "Complex" | "Very Complex";

export interface ReportInput {
  durationMs?: number;
  /** Bytes read */
  inputSize?: number;
  /** Bytes of generated source */
  outputSize?: number;
}

export interface ConversionStats {
  typesCount: number;
  fieldsCount: number;
  optionalFieldsCount: number;
  arrayFieldsCount: number;
  /** Every named type except the root */
  nestedTypesCount: number;
  maxDepth: number;
  durationMs: number;
  inputSize: number;
  outputSize: number;
}

/**
 * Report printed by the CLI
 */
export interface ConversionReport {
  target: string;
  rootName: string;
  stats: ConversionStats;
  complexity: { score: number; label: ComplexityLabel };
  input: string;
  output: string;
}
