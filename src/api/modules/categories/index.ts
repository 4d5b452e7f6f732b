import { FastifyPluginAsync } from "fastify";
import { CategoryService } from "./category.service";
import { CategoryController } from "./category.controller";
import { categoryGroupSchema } from "./category.schema";
import { errorResponseSchema } from "../../core/schemas/shared";

/**
 * Categories module: GET /api/categories (browse)
 */
export const categoriesPlugin: FastifyPluginAsync = async (fastify) => {
  const service = new CategoryService(fastify.catalog);
  const controller = new CategoryController(service);

  fastify.get(
    "/api/categories",
    {
      schema: {
        description: "Whole catalog grouped by category, then brand",
        tags: ["Categories"],
        response: {
          200: { type: "array", items: categoryGroupSchema },
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      await controller.browse(request, reply);
    },
  );
};
