import type { DbHealth } from "../../core/database/health";

/**
 * Mirrors DbHealth from core/database/health.ts
 */
export const dbHealthSchema = {
  type: "object",
  properties: {
    ok: { type: "boolean", description: "False when any issue is at error level" },
    issues: {
      type: "array",
      items: {
        type: "object",
        properties: {
          level: { type: "string", enum: ["error", "warn"] },
          message: { type: "string" },
        },
        required: ["level", "message"],
      },
    },
  },
  required: ["ok", "issues"],
} as const;

export const healthResponseSchema = {
  type: "object",
  properties: {
    status: { type: "string", enum: ["ok"] },
    database: dbHealthSchema,
    timestamp: { type: "string", format: "date-time" },
  },
  required: ["status", "database", "timestamp"],
} as const;

export interface HealthResponse {
  status: "ok";
  database: DbHealth;
  timestamp: string;
}
