import type { SuggestionCandidate, SuggestionCandidatePools } from "../catalog/catalog.types";
import { compareModels } from "../catalog/ordering";
import { trigramSimilarity } from "./trigram";

export interface RankOptions {
  limit: number;
  minSimilarity: number;
}

export interface RankedSuggestion extends SuggestionCandidate {
  tier: "substring" | "similarity";
  /** 1 for substring matches, trigram similarity otherwise. */
  score: number;
}

/**
 * Two-stage merge of suggestion candidates.
 *
 * Tier 1 holds every candidate whose lowercased model number contains the
 * query, in model order. Tier 2 holds the rest that clear `minSimilarity`,
 * best score first. Tier 1 always precedes tier 2; the merged list is cut
 * to `limit`. Candidates are told apart by model id, so the same model
 * number under another brand or category stays a separate entry.
 */
export function rankSuggestions(
  normalizedQuery: string,
  pools: SuggestionCandidatePools,
  options: RankOptions,
): RankedSuggestion[] {
  const seen = new Set<string>();
  const substringTier: RankedSuggestion[] = [];
  const similarityTier: RankedSuggestion[] = [];

  for (const candidate of [...pools.substring, ...pools.similar]) {
    if (seen.has(candidate.modelId)) continue;
    seen.add(candidate.modelId);

    if (candidate.modelNumber.toLowerCase().includes(normalizedQuery)) {
      substringTier.push({ ...candidate, tier: "substring", score: 1 });
      continue;
    }

    const score = trigramSimilarity(normalizedQuery, candidate.modelNumber);
    if (score >= options.minSimilarity) {
      similarityTier.push({ ...candidate, tier: "similarity", score });
    }
  }

  substringTier.sort(compareModels);
  similarityTier.sort((a, b) => b.score - a.score || compareModels(a, b));

  return [...substringTier, ...similarityTier].slice(0, options.limit);
}
