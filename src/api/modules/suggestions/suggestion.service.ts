import type { StoreCallOptions, Suggestion } from "../../../catalog/catalog.types";
import type { CatalogRepository } from "../../../repository/catalog.repository";
import { rankSuggestions } from "../../../search/suggestion.ranker";
import type { SearchConfig } from "../../core/config";
import { throwIfAborted } from "../../core/database/session";
import { resolveLimit } from "../../shared/utils/validation";

/**
 * Autocomplete over model numbers. Substring matches first, then
 * trigram-similar ones; see rankSuggestions for the ordering rules.
 */
export class SuggestionService {
  constructor(
    private readonly repository: CatalogRepository,
    private readonly search: SearchConfig,
  ) {}

  async suggest(query: string | undefined, limit?: unknown, options: StoreCallOptions = {}): Promise<Suggestion[]> {
    const resolvedLimit = resolveLimit(limit, {
      defaultLimit: this.search.suggestionDefaultLimit,
      maxLimit: this.search.suggestionMaxLimit,
    });

    // Too short to be useful; the front end debounces on this
    const normalizedQuery = (query ?? "").trim().toLowerCase();
    if (normalizedQuery.length < this.search.minQueryLength) {
      return [];
    }

    throwIfAborted(options.signal);
    const pools = await this.repository.findSuggestionCandidates(
      normalizedQuery,
      { limit: resolvedLimit, minSimilarity: this.search.minSimilarity },
      options,
    );
    throwIfAborted(options.signal);

    return rankSuggestions(normalizedQuery, pools, {
      limit: resolvedLimit,
      minSimilarity: this.search.minSimilarity,
    }).map((ranked) => ({
      model_number: ranked.modelNumber,
      brand: ranked.brand,
      category: ranked.category,
    }));
  }
}
