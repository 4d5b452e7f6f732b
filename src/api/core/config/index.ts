import dotenv from "dotenv";
import path from "path";
import fs from "fs";

// Walk up from this file until a directory with .env is found;
// fall back to the working directory.
function findProjectRoot(): string {
  let currentDir = __dirname;
  const maxDepth = 10;
  let depth = 0;

  while (depth < maxDepth) {
    if (fs.existsSync(path.join(currentDir, ".env"))) {
      return currentDir;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
    depth++;
  }

  return process.cwd();
}

/**
 * Loads the first env file found, most specific first.
 * Variables already set in the process are never overridden.
 */
export function loadEnvFiles(nodeEnv: string = process.env.NODE_ENV || "development"): string | null {
  const projectRoot = findProjectRoot();
  const envFiles = [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, ".env.local", ".env"];

  for (const file of envFiles) {
    const envPath = path.join(projectRoot, file);
    if (!fs.existsSync(envPath)) continue;

    const result = dotenv.config({ path: envPath });
    if (!result.error) {
      return envPath;
    }
  }

  return null;
}

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  queryTimeout: number;
}

export interface SearchConfig {
  minQueryLength: number;
  suggestionDefaultLimit: number;
  suggestionMaxLimit: number;
  /** Trigram similarity cutoff for the fuzzy tier, in [0, 1]. */
  minSimilarity: number;
}

/**
 * Application configuration
 */
export interface AppConfig {
  port: number;
  host: string;
  env: string;
  domain: string; // server URL advertised in the OpenAPI document
  corsOrigins: string[]; // "*" allows any origin
  logLevel: string;
  db: DatabaseConfig;
  search: SearchConfig;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  range: { min: number; max?: number; integer?: boolean },
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  const outOfRange = value < range.min || (range.max !== undefined && value > range.max);
  if (!Number.isFinite(value) || outOfRange || (range.integer && !Number.isInteger(value))) {
    const bounds = range.max === undefined ? `>= ${range.min}` : `in [${range.min}, ${range.max}]`;
    throw new Error(`${name} must be ${range.integer ? "an integer" : "a number"} ${bounds}, got "${raw}"`);
  }
  return value;
}

function firstDefined(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

/**
 * Builds and validates the configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const port = readNumber(env, "PORT", 8000, { min: 1, max: 65535, integer: true });

  const corsOrigins = (env.CORS_ORIGINS ?? "*")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const defaultLimit = readNumber(env, "SUGGEST_DEFAULT_LIMIT", 10, { min: 1, integer: true });
  const maxLimit = readNumber(env, "SUGGEST_MAX_LIMIT", 50, { min: 1, integer: true });
  if (defaultLimit > maxLimit) {
    throw new Error(`SUGGEST_DEFAULT_LIMIT (${defaultLimit}) exceeds SUGGEST_MAX_LIMIT (${maxLimit})`);
  }

  return {
    port,
    host: env.HOST || "0.0.0.0",
    env: nodeEnv,
    domain: env.API_DOMAIN || `http://localhost:${port}`,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : ["*"],
    logLevel: env.LOG_LEVEL || (nodeEnv === "development" ? "info" : "warn"),
    db: {
      connectionString: firstDefined(env, "DATABASE_URL"),
      host: firstDefined(env, "DB_HOST", "PGHOST") ?? "localhost",
      port: Number(firstDefined(env, "DB_PORT", "PGPORT")) || 5432,
      user: firstDefined(env, "DB_USER", "PGUSER") ?? "postgres",
      password: firstDefined(env, "DB_PASSWORD", "PGPASSWORD") ?? "",
      database: firstDefined(env, "DB_NAME", "PGDATABASE") ?? "appliance_catalog",
      ssl: env.PGSSLMODE === "require",
      max: readNumber(env, "DB_POOL_MAX", 10, { min: 1, integer: true }),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      queryTimeout: readNumber(env, "DB_QUERY_TIMEOUT_MS", 5000, { min: 1, integer: true }),
    },
    search: {
      minQueryLength: 2,
      suggestionDefaultLimit: defaultLimit,
      suggestionMaxLimit: maxLimit,
      minSimilarity: readNumber(env, "SUGGEST_MIN_SIMILARITY", 0.3, { min: 0, max: 1 }),
    },
  };
}
