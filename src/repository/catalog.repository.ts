import type {
  ApplianceConsumableRow,
  StoreCallOptions,
  SuggestionCandidatePools,
} from "../catalog/catalog.types";
import type { DbHealth } from "../api/core/database/health";

export interface CandidateQuery {
  /** Upper bound for each pool. */
  limit: number;
  minSimilarity: number;
}

/**
 * Read-only access to the appliance catalog. The search services depend on
 * this seam only; the PostgreSQL implementation is PgCatalogRepository.
 *
 * All queries receive the query already trimmed and lowercased.
 */
export interface CatalogRepository {
  /** (model, consumable) rows for models whose model_number contains the query. */
  findApplianceRows(normalizedQuery: string, options?: StoreCallOptions): Promise<ApplianceConsumableRow[]>;

  /** Every (model, consumable) row in the catalog. */
  listApplianceRows(options?: StoreCallOptions): Promise<ApplianceConsumableRow[]>;

  findSuggestionCandidates(
    normalizedQuery: string,
    query: CandidateQuery,
    options?: StoreCallOptions,
  ): Promise<SuggestionCandidatePools>;

  checkHealth(): Promise<DbHealth>;
}
