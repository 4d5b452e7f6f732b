import { FastifyPluginAsync } from "fastify";
import type { SearchConfig } from "../../core/config";
import { SuggestionService } from "./suggestion.service";
import { SuggestionController } from "./suggestion.controller";
import { suggestionQuerySchema, suggestionSchema, type SuggestionQuery } from "./suggestion.schema";
import { errorResponseSchema } from "../../core/schemas/shared";

export interface SuggestionsPluginOptions {
  search: SearchConfig;
}

/**
 * Suggestions module: GET /api/suggestions?q=&limit=
 */
export const suggestionsPlugin: FastifyPluginAsync<SuggestionsPluginOptions> = async (fastify, options) => {
  const service = new SuggestionService(fastify.catalog, options.search);
  const controller = new SuggestionController(service);

  fastify.get<{ Querystring: SuggestionQuery }>(
    "/api/suggestions",
    {
      schema: {
        description: "Ranked model-number suggestions: substring matches first, then trigram-similar ones",
        tags: ["Suggestions"],
        querystring: suggestionQuerySchema,
        response: {
          200: { type: "array", items: suggestionSchema },
          400: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      await controller.suggest(request, reply);
    },
  );
};
