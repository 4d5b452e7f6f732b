import { Pool } from "pg";

export type DbIssueLevel = "error" | "warn";

export interface DbIssue {
  level: DbIssueLevel;
  message: string;
}

export interface DbHealth {
  ok: boolean;
  issues: DbIssue[];
}

const REQUIRED_TABLES = ["brands", "categories", "models", "consumables", "model_consumables"];

/**
 * Checks that PostgreSQL answers and that the catalog schema the search
 * queries rely on is in place.
 */
export async function checkDatabaseHealth(pool: Pool): Promise<DbHealth> {
  const issues: DbIssue[] = [];

  // 1) Connectivity
  try {
    await pool.query("SELECT 1");
  } catch (err) {
    issues.push({
      level: "error",
      message: `Could not connect to PostgreSQL: ${String(err)}`,
    });
    return { ok: false, issues };
  }

  // 2) Catalog tables
  try {
    const res = await pool.query<{ table_name: string }>(
      `
        SELECT table_name
        FROM information_schema.tables
        WHERE table_schema = 'public'
          AND table_name = ANY($1::text[])
      `,
      [REQUIRED_TABLES],
    );
    const present = new Set(res.rows.map((r) => r.table_name));
    for (const table of REQUIRED_TABLES) {
      if (!present.has(table)) {
        issues.push({ level: "error", message: `Table public.${table} not found.` });
      }
    }
  } catch (err) {
    issues.push({
      level: "warn",
      message: `Could not check catalog tables: ${String(err)}`,
    });
  }

  // 3) Column added after the first schema revision
  try {
    const res = await pool.query<{ exists: boolean }>(
      `
        SELECT EXISTS (
          SELECT 1
          FROM information_schema.columns
          WHERE table_schema = 'public'
            AND table_name = 'models'
            AND column_name = 'water_filter_missing'
        ) AS exists
      `,
    );
    if (!res.rows[0]?.exists) {
      issues.push({
        level: "error",
        message: 'Column "water_filter_missing" missing from models. Apply db/schema.sql.',
      });
    }
  } catch (err) {
    issues.push({
      level: "warn",
      message: `Could not check models columns: ${String(err)}`,
    });
  }

  // 4) pg_trgm backs both the LIKE index and the similarity tier
  try {
    const res = await pool.query<{ exists: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM pg_extension WHERE extname = 'pg_trgm') AS exists`,
    );
    if (!res.rows[0]?.exists) {
      issues.push({
        level: "error",
        message: "Extension pg_trgm is not installed. Suggestions will fail: CREATE EXTENSION pg_trgm;",
      });
    }
  } catch (err) {
    issues.push({
      level: "warn",
      message: `Could not check pg_trgm extension: ${String(err)}`,
    });
  }

  return {
    ok: !issues.some((i) => i.level === "error"),
    issues,
  };
}
