import { Pool } from "pg";
import type { FastifyBaseLogger } from "fastify";
import type { DatabaseConfig } from "../config";

/**
 * Creates the PostgreSQL pool shared by every request.
 * DATABASE_URL, when set, takes precedence over the discrete settings.
 */
export function createDatabasePool(db: DatabaseConfig, log: FastifyBaseLogger): Pool {
  const connection = db.connectionString
    ? { connectionString: db.connectionString }
    : {
        host: db.host,
        port: db.port,
        user: db.user,
        password: db.password,
        database: db.database,
      };

  const pool = new Pool({
    ...connection,
    ssl: db.ssl ? { rejectUnauthorized: false } : undefined,
    max: db.max,
    idleTimeoutMillis: db.idleTimeoutMillis,
    connectionTimeoutMillis: db.connectionTimeoutMillis,
    query_timeout: db.queryTimeout,
    statement_timeout: db.queryTimeout,
  });

  // An idle client dropped by the server surfaces here, not in a request
  pool.on("error", (err) => {
    log.error({ err, host: db.host, database: db.database }, "Database pool error");
  });

  if (process.env.DEBUG) {
    pool.on("connect", () => log.debug("New database connection established"));
    pool.on("remove", () => log.debug("Database connection removed from pool"));
  }

  return pool;
}
