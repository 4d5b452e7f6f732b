import { applianceSchema } from "../../core/schemas/shared";

/**
 * JSON Schema for the consumables lookup
 */
export const consumableQuerySchema = {
  type: "object",
  properties: {
    model: { type: "string", description: "Appliance model number, or any part of it" },
  },
  required: ["model"],
} as const;

export const applianceListSchema = {
  type: "array",
  items: applianceSchema,
} as const;

export interface ConsumableQuery {
  model: string;
}
