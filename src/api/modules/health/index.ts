import { FastifyPluginAsync } from "fastify";
import { healthResponseSchema, type HealthResponse } from "./health.schema";

/**
 * GET /health: the process answers; `database` carries the catalog
 * schema check, which may report issues without failing the request.
 */
export const healthPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    "/health",
    {
      schema: {
        description: "Service and catalog database health",
        tags: ["Health"],
        response: {
          200: healthResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const body: HealthResponse = {
        status: "ok",
        database: await fastify.catalog.checkHealth(),
        timestamp: new Date().toISOString(),
      };
      return reply.send(body);
    },
  );
};
