import { FastifyRequest, FastifyReply } from "fastify";
import { SuggestionService } from "./suggestion.service";
import type { SuggestionQuery } from "./suggestion.schema";
import { abortSignalFor } from "../../shared/utils/abort";

export class SuggestionController {
  constructor(private service: SuggestionService) {}

  async suggest(
    request: FastifyRequest<{ Querystring: SuggestionQuery }>,
    reply: FastifyReply,
  ): Promise<void> {
    const { q, limit } = request.query;
    const suggestions = await this.service.suggest(q, limit, { signal: abortSignalFor(reply) });

    request.log.debug({ q, limit, count: suggestions.length }, "suggestions ranked");
    reply.send(suggestions);
  }
}
