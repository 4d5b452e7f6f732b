import Fastify, { FastifyInstance, FastifyServerOptions } from "fastify";
import type { AppConfig } from "./core/config";
import { databasePlugin } from "./core/database";
import { catalogPlugin } from "./core/plugins/catalog";
import { corsPlugin } from "./core/plugins/cors";
import { loggerPlugin } from "./core/plugins/logger";
import { swaggerPlugin } from "./core/plugins/swagger";
import { createErrorHandler } from "./core/errors/error-handler";
import { consumablesPlugin } from "./modules/consumables";
import { suggestionsPlugin } from "./modules/suggestions";
import { categoriesPlugin } from "./modules/categories";
import { healthPlugin } from "./modules/health";
import type { CatalogRepository } from "../repository/catalog.repository";

export interface AppDependencies {
  /** Skips the PostgreSQL pool entirely when given. */
  repository?: CatalogRepository;
  /** Overrides the pino logger settings derived from config. */
  logger?: FastifyServerOptions["logger"];
}

function loggerOptions(config: AppConfig): FastifyServerOptions["logger"] {
  if (config.env !== "development") {
    return { level: config.logLevel };
  }

  return {
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        translateTime: "HH:MM:ss Z",
        ignore: "pid,hostname",
      },
    },
  };
}

/**
 * Builds the Fastify application
 */
export async function createApp(config: AppConfig, deps: AppDependencies = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logger ?? loggerOptions(config),
    trustProxy: true, // behind a reverse proxy in production
  });

  // Core plugins
  await app.register(corsPlugin, { origins: config.corsOrigins });
  await app.register(loggerPlugin);
  if (!deps.repository) {
    await app.register(databasePlugin, { db: config.db });
  }
  await app.register(catalogPlugin, { repository: deps.repository });
  await app.register(swaggerPlugin, { domain: config.domain, env: config.env });

  // Before business routes: encapsulation
  app.setErrorHandler(createErrorHandler(config.env));

  await app.register(consumablesPlugin);
  await app.register(suggestionsPlugin, { search: config.search });
  await app.register(categoriesPlugin);
  await app.register(healthPlugin);

  return app;
}
