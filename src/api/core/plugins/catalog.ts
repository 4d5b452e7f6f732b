import fp from "fastify-plugin";
import { FastifyInstance } from "fastify";
import type { CatalogRepository } from "../../../repository/catalog.repository";
import { PgCatalogRepository } from "../../../repository/pg-catalog.repository";

declare module "fastify" {
  interface FastifyInstance {
    catalog: CatalogRepository;
  }
}

export interface CatalogPluginOptions {
  /** Replaces the PostgreSQL repository (tests, alternate stores). */
  repository?: CatalogRepository;
}

/**
 * Decorates the instance with `fastify.catalog`. Without an explicit
 * repository it reads through the pool registered by database-plugin.
 */
export const catalogPlugin = fp(
  async function catalogPlugin(fastify: FastifyInstance, options: CatalogPluginOptions) {
    const repository = options.repository ?? new PgCatalogRepository(fastify.db);
    fastify.decorate("catalog", repository);
  },
  { name: "catalog-plugin" },
);
