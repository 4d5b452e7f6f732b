/**
 * Wire shapes returned to the presentation layer.
 * Field names stay snake_case: the front end reads them as-is.
 */
export interface ConsumableResult {
  name: string;
  type: string;
  sku: string | null;
  asin: string | null;
  purchase_url: string | null;
  notes: string | null;
}

export interface ApplianceResult {
  brand: string;
  category: string;
  model: string;
  water_filter_missing: boolean;
  consumables: ConsumableResult[];
}

export interface Suggestion {
  model_number: string;
  brand: string;
  category: string;
}

export interface BrandGroup {
  brand: string;
  appliances: ApplianceResult[];
}

export interface CategoryGroup {
  category: string;
  brands: BrandGroup[];
}

/**
 * One (model, consumable) pairing as the store returns it.
 * Consumable columns are null for a model with no pairings (LEFT JOIN).
 */
export interface ApplianceConsumableRow {
  modelId: string;
  modelNumber: string;
  brand: string;
  category: string;
  waterFilterMissing: boolean;
  consumableId: string | null;
  consumableName: string | null;
  consumableType: string | null;
  sku: string | null;
  asin: string | null;
  purchaseUrl: string | null;
  notes: string | null;
}

export interface SuggestionCandidate {
  modelId: string;
  modelNumber: string;
  brand: string;
  category: string;
}

export interface SuggestionCandidatePools {
  /** Models whose lowercased model_number contains the query. */
  substring: SuggestionCandidate[];
  /** Models above the similarity cutoff that do not contain the query. */
  similar: SuggestionCandidate[];
}

export interface StoreCallOptions {
  signal?: AbortSignal;
}
