import { applianceSchema } from "../../core/schemas/shared";

/**
 * Category → brand → appliances
 */
export const categoryGroupSchema = {
  type: "object",
  properties: {
    category: { type: "string" },
    brands: {
      type: "array",
      items: {
        type: "object",
        properties: {
          brand: { type: "string" },
          appliances: { type: "array", items: applianceSchema },
        },
        required: ["brand", "appliances"],
      },
    },
  },
  required: ["category", "brands"],
} as const;
