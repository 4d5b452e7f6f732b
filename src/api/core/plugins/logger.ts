import fp from "fastify-plugin";
import { FastifyInstance } from "fastify";

/**
 * Request logging. Wrapped in fastify-plugin so the hooks cover every
 * route, not just this plugin's own scope.
 */
export const loggerPlugin = fp(
  async function loggerPlugin(fastify: FastifyInstance) {
    fastify.addHook("onRequest", async (request) => {
      request.startTime = Date.now();

      fastify.log.info(
        {
          method: request.method,
          url: request.url,
          ip: request.ip,
        },
        `→ ${request.method} ${request.url}`,
      );
    });

    fastify.addHook("onResponse", async (request, reply) => {
      const duration = Date.now() - (request.startTime ?? Date.now());
      const statusCode = reply.statusCode;
      const line = `${request.method} ${request.url} → ${statusCode} (${duration}ms)`;
      const fields = { method: request.method, url: request.url, statusCode, duration };

      if (statusCode >= 500) fastify.log.error(fields, line);
      else if (statusCode >= 400) fastify.log.warn(fields, line);
      else fastify.log.info(fields, line);
    });
  },
  { name: "logger-plugin" },
);

declare module "fastify" {
  interface FastifyRequest {
    startTime?: number;
  }
}
