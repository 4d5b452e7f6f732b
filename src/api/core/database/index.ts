import fp from "fastify-plugin";
import { FastifyInstance } from "fastify";
import { Pool } from "pg";
import type { DatabaseConfig } from "../config";
import { createDatabasePool } from "./pool";

declare module "fastify" {
  interface FastifyInstance {
    db: Pool;
  }
}

export interface DatabasePluginOptions {
  db: DatabaseConfig;
}

/**
 * Decorates the instance with `fastify.db`: one pool per process,
 * created at startup and drained on close.
 */
export const databasePlugin = fp(
  async function databasePlugin(fastify: FastifyInstance, options: DatabasePluginOptions) {
    const pool = createDatabasePool(options.db, fastify.log);

    fastify.decorate("db", pool);

    fastify.addHook("onClose", async () => {
      fastify.log.info("Closing database connections...");
      await pool.end();
    });
  },
  { name: "database-plugin" },
);
