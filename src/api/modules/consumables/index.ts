import { FastifyPluginAsync } from "fastify";
import { ConsumableService } from "./consumable.service";
import { ConsumableController } from "./consumable.controller";
import { applianceListSchema, consumableQuerySchema, type ConsumableQuery } from "./consumable.schema";
import { errorResponseSchema } from "../../core/schemas/shared";

/**
 * Consumables module: GET /api/consumables?model=
 */
export const consumablesPlugin: FastifyPluginAsync = async (fastify) => {
  const service = new ConsumableService(fastify.catalog);
  const controller = new ConsumableController(service);

  fastify.get<{ Querystring: ConsumableQuery }>(
    "/api/consumables",
    {
      schema: {
        description: "Appliances whose model number contains the query, with their consumables",
        tags: ["Consumables"],
        querystring: consumableQuerySchema,
        response: {
          200: applianceListSchema,
          400: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      await controller.search(request, reply);
    },
  );
};
