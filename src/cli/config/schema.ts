/**
 * JSON Schema for FieldScope configuration files
 */

export const CONFIG_FILE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    logLevel: { type: "string", enum: ["error", "warn", "info", "debug"] },
    profile: {
      type: "object",
      additionalProperties: false,
      properties: {
        delimiter: { type: "string", minLength: 1, maxLength: 1 },
        quoteChar: { type: "string", minLength: 1, maxLength: 1 },
        hasHeader: { type: "boolean" },
        fields: {
          type: "array",
          items: { type: "integer", minimum: 0 },
        },
        maxFreqSize: { type: "integer", minimum: 1 },
        sampleSize: { type: "integer", minimum: 1 },
        topValues: { type: "integer", minimum: 0 },
        unknownMarkers: { type: "array", items: { type: "string" } },
        declaredTypes: {
          type: "object",
          propertyNames: { pattern: "^[0-9]+$" },
          additionalProperties: {
            type: "string",
            enum: ["unknown", "integer", "float", "timestamp", "string"],
          },
        },
      },
    },
  },
} as const;
