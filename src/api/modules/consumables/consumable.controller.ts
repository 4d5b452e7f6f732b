import { FastifyRequest, FastifyReply } from "fastify";
import { ConsumableService } from "./consumable.service";
import type { ConsumableQuery } from "./consumable.schema";
import { abortSignalFor } from "../../shared/utils/abort";

export class ConsumableController {
  constructor(private service: ConsumableService) {}

  async search(
    request: FastifyRequest<{ Querystring: ConsumableQuery }>,
    reply: FastifyReply,
  ): Promise<void> {
    const { model } = request.query;
    const appliances = await this.service.searchConsumables(model, { signal: abortSignalFor(reply) });

    request.log.debug({ model, matches: appliances.length }, "consumables lookup");
    reply.send(appliances);
  }
}
