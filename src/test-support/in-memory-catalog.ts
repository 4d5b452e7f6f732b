import type {
  ApplianceConsumableRow,
  StoreCallOptions,
  SuggestionCandidate,
  SuggestionCandidatePools,
} from "../catalog/catalog.types";
import { compareModels } from "../catalog/ordering";
import type { DbHealth } from "../api/core/database/health";
import type { CandidateQuery, CatalogRepository } from "../repository/catalog.repository";
import { trigramSimilarity } from "../search/trigram";

export interface ConsumableFixture {
  id: string;
  name: string;
  type: string;
  sku?: string;
  asin?: string;
  purchaseUrl?: string;
  notes?: string;
}

export interface ModelFixture {
  id: string;
  brand: string;
  category: string;
  modelNumber: string;
  waterFilterMissing?: boolean;
  consumables?: ConsumableFixture[];
}

/**
 * In-process stand-in for PgCatalogRepository. Mirrors its filters
 * (substring containment, similarity cutoff, per-pool limit) over a fixed
 * list of models and records the calls it receives.
 */
export class InMemoryCatalogRepository implements CatalogRepository {
  readonly calls: Array<{ method: string; query?: string; candidateQuery?: CandidateQuery }> = [];
  failure: Error | null = null;
  health: DbHealth = { ok: true, issues: [] };

  constructor(private readonly models: ModelFixture[]) {}

  async findApplianceRows(normalizedQuery: string, _options?: StoreCallOptions): Promise<ApplianceConsumableRow[]> {
    this.record({ method: "findApplianceRows", query: normalizedQuery });
    return this.models
      .filter((model) => model.modelNumber.toLowerCase().includes(normalizedQuery))
      .flatMap((model) => this.toRows(model));
  }

  async listApplianceRows(_options?: StoreCallOptions): Promise<ApplianceConsumableRow[]> {
    this.record({ method: "listApplianceRows" });
    return this.models.flatMap((model) => this.toRows(model));
  }

  async findSuggestionCandidates(
    normalizedQuery: string,
    candidateQuery: CandidateQuery,
    _options?: StoreCallOptions,
  ): Promise<SuggestionCandidatePools> {
    this.record({ method: "findSuggestionCandidates", query: normalizedQuery, candidateQuery });

    const contains = (model: ModelFixture) => model.modelNumber.toLowerCase().includes(normalizedQuery);
    const substring = this.models.filter(contains).map(toCandidate).sort(compareModels);
    const similar = this.models
      .filter((model) => !contains(model))
      .map((model) => ({ candidate: toCandidate(model), score: trigramSimilarity(normalizedQuery, model.modelNumber) }))
      .filter(({ score }) => score >= candidateQuery.minSimilarity)
      .sort((a, b) => b.score - a.score || compareModels(a.candidate, b.candidate))
      .map(({ candidate }) => candidate);

    return {
      substring: substring.slice(0, candidateQuery.limit),
      similar: similar.slice(0, candidateQuery.limit),
    };
  }

  async checkHealth(): Promise<DbHealth> {
    this.record({ method: "checkHealth" });
    return this.health;
  }

  private record(call: { method: string; query?: string; candidateQuery?: CandidateQuery }): void {
    this.calls.push(call);
    if (this.failure) {
      throw this.failure;
    }
  }

  private toRows(model: ModelFixture): ApplianceConsumableRow[] {
    const base = {
      modelId: model.id,
      modelNumber: model.modelNumber,
      brand: model.brand,
      category: model.category,
      waterFilterMissing: model.waterFilterMissing ?? false,
    };
    const consumables = model.consumables ?? [];

    if (consumables.length === 0) {
      return [
        {
          ...base,
          consumableId: null,
          consumableName: null,
          consumableType: null,
          sku: null,
          asin: null,
          purchaseUrl: null,
          notes: null,
        },
      ];
    }

    return consumables.map((consumable) => ({
      ...base,
      consumableId: consumable.id,
      consumableName: consumable.name,
      consumableType: consumable.type,
      sku: consumable.sku ?? null,
      asin: consumable.asin ?? null,
      purchaseUrl: consumable.purchaseUrl ?? null,
      notes: consumable.notes ?? null,
    }));
  }
}

function toCandidate(model: ModelFixture): SuggestionCandidate {
  return {
    modelId: model.id,
    modelNumber: model.modelNumber,
    brand: model.brand,
    category: model.category,
  };
}

/**
 * GE refrigerator with one water filter, and a close-but-different model.
 */
export const REFRIGERATOR_CATALOG: ModelFixture[] = [
  {
    id: "1",
    brand: "GE",
    category: "Refrigerator",
    modelNumber: "GSS25GSHSS",
    consumables: [
      {
        id: "10",
        name: "Water Filter",
        type: "filter",
        sku: "WF001",
        purchaseUrl: "https://example.com/wf001",
      },
    ],
  },
  {
    id: "2",
    brand: "GE",
    category: "Refrigerator",
    modelNumber: "GSE25HSHSS",
  },
];
