/**
 * JSON Schema for the configuration file
 */

import { INPUT_FORMATS } from "../../types/value.js";

const stringList = { type: "array", items: { type: "string" } } as const;

export const CONFIG_FILE_SCHEMA = {
  $id: "typesmith-config",
  type: "object",
  additionalProperties: false,
  properties: {
    rootName: { type: "string", minLength: 1 },
    target: { type: "string", minLength: 1 },
    inputFormat: { type: "string", enum: [...INPUT_FORMATS] },
    inference: {
      type: "object",
      additionalProperties: false,
      properties: {
        mapThreshold: { type: "integer" },
        maxMapValueVariants: { type: "integer" },
        detectKeyPatterns: { type: "boolean" },
        minPatternKeys: { type: "integer" },
        patterns: {
          type: "array",
          items: {
            type: "object",
            additionalProperties: false,
            required: ["name", "regex"],
            properties: {
              name: { type: "string", minLength: 1 },
              regex: { type: "string", minLength: 1 },
            },
          },
        },
        forceMapPaths: stringList,
        forceRecordPaths: stringList,
      },
    },
    render: {
      type: "object",
      additionalProperties: false,
      properties: {
        indentStyle: { type: "string", enum: ["spaces", "tabs"] },
        indentSize: { type: "integer" },
        includeComments: { type: "boolean" },
        readonly: { type: "boolean" },
        optionalFields: { type: "boolean" },
        deriveMacros: stringList,
        publicFields: { type: "boolean" },
        strictUnions: { type: "boolean" },
      },
    },
  },
} as const;
