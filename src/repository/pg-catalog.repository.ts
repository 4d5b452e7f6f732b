import type { Pool, PoolClient } from "pg";
import type {
  ApplianceConsumableRow,
  StoreCallOptions,
  SuggestionCandidate,
  SuggestionCandidatePools,
} from "../catalog/catalog.types";
import { checkDatabaseHealth, type DbHealth } from "../api/core/database/health";
import { throwIfAborted, withReadOnlySession } from "../api/core/database/session";
import type { CandidateQuery, CatalogRepository } from "./catalog.repository";
import { containsPattern } from "./like-pattern";

/**
 * PostgreSQL catalog access.
 *
 * Expects the schema from db/schema.sql: pg_trgm installed and a GIN
 * gin_trgm_ops index on LOWER(model_number), which serves both the LIKE
 * substring filter and the % similarity operator.
 *
 * Ordering uses COLLATE "C" so the rows picked under LIMIT agree with the
 * code-unit ordering applied in process.
 */

interface ApplianceRowRecord {
  model_id: string;
  model_number: string;
  brand: string;
  category: string;
  water_filter_missing: boolean;
  consumable_id: string | null;
  consumable_name: string | null;
  consumable_type: string | null;
  sku: string | null;
  asin: string | null;
  purchase_url: string | null;
  notes: string | null;
}

interface CandidateRecord {
  model_id: string;
  model_number: string;
  brand: string;
  category: string;
}

const APPLIANCE_ROWS_SQL = `
  SELECT
    m.id::text AS model_id,
    m.model_number,
    b.name AS brand,
    c.name AS category,
    m.water_filter_missing,
    co.id::text AS consumable_id,
    co.name AS consumable_name,
    co.type AS consumable_type,
    co.sku,
    co.asin,
    co.purchase_url,
    mc.notes
  FROM models m
  JOIN brands b ON b.id = m.brand_id
  JOIN categories c ON c.id = m.category_id
  LEFT JOIN model_consumables mc ON mc.model_id = m.id
  LEFT JOIN consumables co ON co.id = mc.consumable_id
`;

const APPLIANCE_ORDER_SQL = `
  ORDER BY m.model_number COLLATE "C", b.name COLLATE "C", c.name COLLATE "C", m.id, co.name COLLATE "C", co.id
`;

const CANDIDATE_COLUMNS_SQL = `
  SELECT m.id::text AS model_id, m.model_number, b.name AS brand, c.name AS category
  FROM models m
  JOIN brands b ON b.id = m.brand_id
  JOIN categories c ON c.id = m.category_id
`;

function toApplianceRow(row: ApplianceRowRecord): ApplianceConsumableRow {
  return {
    modelId: row.model_id,
    modelNumber: row.model_number,
    brand: row.brand,
    category: row.category,
    waterFilterMissing: row.water_filter_missing,
    consumableId: row.consumable_id,
    consumableName: row.consumable_name,
    consumableType: row.consumable_type,
    sku: row.sku,
    asin: row.asin,
    purchaseUrl: row.purchase_url,
    notes: row.notes,
  };
}

function toCandidate(row: CandidateRecord): SuggestionCandidate {
  return {
    modelId: row.model_id,
    modelNumber: row.model_number,
    brand: row.brand,
    category: row.category,
  };
}

export class PgCatalogRepository implements CatalogRepository {
  constructor(private readonly pool: Pool) {}

  async findApplianceRows(
    normalizedQuery: string,
    options: StoreCallOptions = {},
  ): Promise<ApplianceConsumableRow[]> {
    return withReadOnlySession(
      this.pool,
      async (client: PoolClient) => {
        const result = await client.query<ApplianceRowRecord>(
          `${APPLIANCE_ROWS_SQL} WHERE LOWER(m.model_number) LIKE $1 ${APPLIANCE_ORDER_SQL}`,
          [containsPattern(normalizedQuery)],
        );
        return result.rows.map(toApplianceRow);
      },
      options.signal,
    );
  }

  async listApplianceRows(options: StoreCallOptions = {}): Promise<ApplianceConsumableRow[]> {
    return withReadOnlySession(
      this.pool,
      async (client: PoolClient) => {
        const result = await client.query<ApplianceRowRecord>(`${APPLIANCE_ROWS_SQL} ${APPLIANCE_ORDER_SQL}`);
        return result.rows.map(toApplianceRow);
      },
      options.signal,
    );
  }

  async findSuggestionCandidates(
    normalizedQuery: string,
    query: CandidateQuery,
    options: StoreCallOptions = {},
  ): Promise<SuggestionCandidatePools> {
    const pattern = containsPattern(normalizedQuery);

    return withReadOnlySession(
      this.pool,
      async (client: PoolClient) => {
        const substring = await this.findSubstringCandidates(client, pattern, query.limit);
        throwIfAborted(options.signal);
        const similar = await this.findSimilarCandidates(client, normalizedQuery, pattern, query);
        return { substring, similar };
      },
      options.signal,
    );
  }

  async checkHealth(): Promise<DbHealth> {
    return checkDatabaseHealth(this.pool);
  }

  private async findSubstringCandidates(
    client: PoolClient,
    pattern: string,
    limit: number,
  ): Promise<SuggestionCandidate[]> {
    const result = await client.query<CandidateRecord>(
      `
        ${CANDIDATE_COLUMNS_SQL}
        WHERE LOWER(m.model_number) LIKE $1
        ORDER BY m.model_number COLLATE "C", b.name COLLATE "C", c.name COLLATE "C", m.id
        LIMIT $2
      `,
      [pattern, limit],
    );
    return result.rows.map(toCandidate);
  }

  private async findSimilarCandidates(
    client: PoolClient,
    normalizedQuery: string,
    pattern: string,
    query: CandidateQuery,
  ): Promise<SuggestionCandidate[]> {
    // Scoped to the surrounding transaction; lets % use the trigram index
    // with our cutoff instead of the server default.
    await client.query(`SELECT set_config('pg_trgm.similarity_threshold', $1, true)`, [
      String(query.minSimilarity),
    ]);

    const result = await client.query<CandidateRecord>(
      `
        ${CANDIDATE_COLUMNS_SQL}
        WHERE LOWER(m.model_number) % $1
          AND LOWER(m.model_number) NOT LIKE $2
        ORDER BY similarity(LOWER(m.model_number), $1) DESC,
                 m.model_number COLLATE "C", b.name COLLATE "C", c.name COLLATE "C", m.id
        LIMIT $3
      `,
      [normalizedQuery, pattern, query.limit],
    );
    return result.rows.map(toCandidate);
  }
}
