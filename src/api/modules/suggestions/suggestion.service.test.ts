import { describe, expect, it } from "vitest";
import { SuggestionService } from "./suggestion.service";
import type { SearchConfig } from "../../core/config";
import { InvalidParameterError, StoreUnavailableError } from "../../core/errors/app-error";
import { InMemoryCatalogRepository, type ModelFixture, REFRIGERATOR_CATALOG } from "../../../test-support/in-memory-catalog";

const search: SearchConfig = {
  minQueryLength: 2,
  suggestionDefaultLimit: 10,
  suggestionMaxLimit: 50,
  minSimilarity: 0.3,
};

const numberedCatalog: ModelFixture[] = Array.from({ length: 15 }, (_, i) => ({
  id: String(i + 1),
  brand: "Acme",
  category: "Dishwasher",
  modelNumber: `ABC${String(i + 1).padStart(3, "0")}`,
}));

describe("SuggestionService.suggest", () => {
  it("ranks the substring match first and leaves out models below the cutoff", async () => {
    const service = new SuggestionService(new InMemoryCatalogRepository(REFRIGERATOR_CATALOG), search);

    await expect(service.suggest("gss25", 10)).resolves.toEqual([
      { model_number: "GSS25GSHSS", brand: "GE", category: "Refrigerator" },
    ]);
  });

  it("includes similarity matches after substring matches when they clear the cutoff", async () => {
    const service = new SuggestionService(new InMemoryCatalogRepository(REFRIGERATOR_CATALOG), {
      ...search,
      minSimilarity: 0.1,
    });

    const suggestions = await service.suggest("gss25", 10);

    expect(suggestions.map((s) => s.model_number)).toEqual(["GSS25GSHSS", "GSE25HSHSS"]);
  });

  it("returns [] below the minimum query length without querying the store", async () => {
    const repository = new InMemoryCatalogRepository(REFRIGERATOR_CATALOG);
    const service = new SuggestionService(repository, search);

    await expect(service.suggest("g", 10)).resolves.toEqual([]);
    await expect(service.suggest("  g  ", 10)).resolves.toEqual([]);
    await expect(service.suggest(undefined)).resolves.toEqual([]);
    expect(repository.calls).toEqual([]);
  });

  it("never returns more than the limit", async () => {
    const service = new SuggestionService(new InMemoryCatalogRepository(numberedCatalog), search);

    const suggestions = await service.suggest("abc", 5);

    expect(suggestions.map((s) => s.model_number)).toEqual(["ABC001", "ABC002", "ABC003", "ABC004", "ABC005"]);
  });

  it("defaults the limit to 10", async () => {
    const repository = new InMemoryCatalogRepository(numberedCatalog);
    const service = new SuggestionService(repository, search);

    await expect(service.suggest("abc")).resolves.toHaveLength(10);
    expect(repository.calls[0]?.candidateQuery).toEqual({ limit: 10, minSimilarity: 0.3 });
  });

  it("clamps the limit to the configured maximum", async () => {
    const repository = new InMemoryCatalogRepository(numberedCatalog);
    const service = new SuggestionService(repository, search);

    await service.suggest("abc", 500);

    expect(repository.calls[0]?.candidateQuery).toEqual({ limit: 50, minSimilarity: 0.3 });
  });

  it.each([0, -1, 2.5, "abc", ""])("rejects limit %j", async (limit) => {
    const service = new SuggestionService(new InMemoryCatalogRepository(REFRIGERATOR_CATALOG), search);

    await expect(service.suggest("gss25", limit)).rejects.toBeInstanceOf(InvalidParameterError);
  });

  it("rejects a malformed limit even when the query is too short", async () => {
    const service = new SuggestionService(new InMemoryCatalogRepository(REFRIGERATOR_CATALOG), search);

    await expect(service.suggest("g", -3)).rejects.toBeInstanceOf(InvalidParameterError);
  });

  it("propagates store unavailability without retrying", async () => {
    const repository = new InMemoryCatalogRepository(REFRIGERATOR_CATALOG);
    repository.failure = new StoreUnavailableError();
    const service = new SuggestionService(repository, search);

    await expect(service.suggest("gss25", 10)).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(repository.calls).toHaveLength(1);
  });

  it("gives identical output for identical input", async () => {
    const service = new SuggestionService(new InMemoryCatalogRepository(numberedCatalog), search);

    expect(await service.suggest("abc01", 10)).toEqual(await service.suggest("abc01", 10));
  });
});
