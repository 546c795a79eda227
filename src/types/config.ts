/**
 * Configuration types for inference and rendering
 */

/**
 * Id-like key pattern used by the map classifier
 */
export interface KeyPatternConfig {
  name: string;
  regex: string;
}

/**
 * Map/record classification policy
 */
export interface MapDetectionConfig {
  /** An object needs strictly more keys than this to be a Map by count */
  mapThreshold: number;

  /** Largest union cardinality accepted for a Map's value type */
  maxMapValueVariants: number;

  /** Treat objects whose keys all match one id-like pattern as Map candidates */
  detectKeyPatterns: boolean;

  /** Minimum key count before key patterns are considered */
  minPatternKeys: number;

  patterns: KeyPatternConfig[];

  /** Value paths always classified as Map */
  forceMapPaths: string[];

  /** Value paths always classified as Record */
  forceRecordPaths: string[];
}

export interface InferenceOptions extends MapDetectionConfig {
  /**
   * Samples carry integers as bigint, so every number is a float. Set for
   * values from parseSamples(), which keeps `1.0` apart from `1`.
   */
  integersAsBigInt: boolean;
}

export const DEFAULT_KEY_PATTERNS: KeyPatternConfig[] = [
  {
    name: "UUID",
    regex: "^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$",
  },
  { name: "OBJECT_ID", regex: "^[0-9a-fA-F]{24}$" },
  { name: "ULID", regex: "^[0-9A-HJKMNP-TV-Z]{26}$" },
  { name: "NUMERIC", regex: "^\\d+$" },
  { name: "ISO_DATE", regex: "^\\d{4}-\\d{2}-\\d{2}([T ][0-9:.+\\-Z]*)?$" },
];

export const DEFAULT_INFERENCE_OPTIONS: InferenceOptions = {
  mapThreshold: 4,
  maxMapValueVariants: 1,
  detectKeyPatterns: true,
  minPatternKeys: 2,
  patterns: DEFAULT_KEY_PATTERNS,
  forceMapPaths: [],
  forceRecordPaths: [],
  integersAsBigInt: false,
};

export type IndentStyle = "spaces" | "tabs";

/**
 * Knobs understood by every renderer. Target-specific knobs are ignored by
 * renderers they do not apply to.
 */
export interface RenderOptions {
  /** Display name for the root declaration; defaults to the graph's root name */
  rootName?: string;
  indentStyle: IndentStyle;
  /** Spaces per level; each renderer has its own default */
  indentSize?: number;
  /** Annotate records with their source path and renamed fields with their key */
  includeComments: boolean;

  /** typescript: `readonly` properties */
  readonly: boolean;
  /** typescript, zod, python: mark every field optional */
  optionalFields: boolean;
  /** rust: derive list */
  deriveMacros: string[];
  /** rust: `pub` fields */
  publicFields: boolean;
  /** rust: throw instead of falling back to serde_json::Value for unions */
  strictUnions: boolean;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  indentStyle: "spaces",
  includeComments: false,
  readonly: false,
  optionalFields: false,
  deriveMacros: ["Debug", "Clone", "Serialize", "Deserialize"],
  publicFields: true,
  strictUnions: false,
};

/**
 * Options accepted by generate()
 */
export interface GenerateOptions {
  inference?: Partial<InferenceOptions>;
  render?: Partial<RenderOptions>;
}
