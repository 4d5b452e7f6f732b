import { FastifyRequest, FastifyReply } from "fastify";
import { CategoryService } from "./category.service";
import { abortSignalFor } from "../../shared/utils/abort";

export class CategoryController {
  constructor(private service: CategoryService) {}

  async browse(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const groups = await this.service.browse({ signal: abortSignalFor(reply) });

    request.log.debug({ categories: groups.length }, "catalog browse");
    reply.send(groups);
  }
}
