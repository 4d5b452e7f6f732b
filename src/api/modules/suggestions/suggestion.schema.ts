/**
 * JSON Schema for model-number autocomplete
 */
export const suggestionQuerySchema = {
  type: "object",
  properties: {
    q: { type: "string", default: "", description: "Partial model number; under 2 characters yields []" },
    limit: {
      type: "string",
      pattern: "^[1-9][0-9]*$",
      description: "Maximum suggestions, a positive decimal integer (default 10, clamped to 50)",
    },
  },
} as const;

export const suggestionSchema = {
  type: "object",
  properties: {
    model_number: { type: "string" },
    brand: { type: "string" },
    category: { type: "string" },
  },
  required: ["model_number", "brand", "category"],
} as const;

export interface SuggestionQuery {
  q?: string;
  limit?: string;
}
