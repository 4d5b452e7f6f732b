/**
 * Shared JSON Schema definitions
 */

/**
 * Error body produced by the global error handler
 */
export const errorResponseSchema = {
  type: "object",
  properties: {
    detail: { type: "string" },
    code: { type: "string" },
  },
  required: ["detail", "code"],
} as const;

export const consumableSchema = {
  type: "object",
  properties: {
    name: { type: "string" },
    type: { type: "string" },
    sku: { type: ["string", "null"] },
    asin: { type: ["string", "null"] },
    purchase_url: { type: ["string", "null"] },
    notes: { type: ["string", "null"] },
  },
  required: ["name", "type", "sku", "asin", "purchase_url", "notes"],
} as const;

export const applianceSchema = {
  type: "object",
  properties: {
    brand: { type: "string" },
    category: { type: "string" },
    model: { type: "string" },
    water_filter_missing: { type: "boolean" },
    consumables: { type: "array", items: consumableSchema },
  },
  required: ["brand", "category", "model", "water_filter_missing", "consumables"],
} as const;
