import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { createApp } from "./app";
import { loadConfig } from "./core/config";
import { StoreUnavailableError } from "./core/errors/app-error";
import { InMemoryCatalogRepository, REFRIGERATOR_CATALOG } from "../test-support/in-memory-catalog";

describe("HTTP API", () => {
  let repository: InMemoryCatalogRepository;
  let app: FastifyInstance;

  beforeEach(async () => {
    repository = new InMemoryCatalogRepository(REFRIGERATOR_CATALOG);
    app = await createApp(loadConfig({ NODE_ENV: "test" }), { repository, logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /api/consumables", () => {
    it("returns matching appliances with their consumables", async () => {
      const response = await app.inject({ method: "GET", url: "/api/consumables?model=GSS25GSHSS" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual([
        {
          brand: "GE",
          category: "Refrigerator",
          model: "GSS25GSHSS",
          water_filter_missing: false,
          consumables: [
            {
              name: "Water Filter",
              type: "filter",
              sku: "WF001",
              asin: null,
              purchase_url: "https://example.com/wf001",
              notes: null,
            },
          ],
        },
      ]);
    });

    it("returns an empty list when nothing matches", async () => {
      const response = await app.inject({ method: "GET", url: "/api/consumables?model=zzz" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual([]);
    });

    it("rejects a blank model", async () => {
      const response = await app.inject({ method: "GET", url: "/api/consumables?model=%20%20" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Model query cannot be empty.", code: "INVALID_QUERY" });
      expect(repository.calls).toEqual([]);
    });

    it("rejects a missing model parameter", async () => {
      const response = await app.inject({ method: "GET", url: "/api/consumables" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: "VALIDATION_ERROR" });
    });

    it("reports an unavailable store as 503", async () => {
      repository.failure = new StoreUnavailableError("Catalog store is unavailable, try again shortly");

      const response = await app.inject({ method: "GET", url: "/api/consumables?model=gss" });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        detail: "Catalog store is unavailable, try again shortly",
        code: "STORE_UNAVAILABLE",
      });
    });

    it("hides unexpected failures behind a generic message", async () => {
      repository.failure = new Error('relation "models" does not exist');

      const response = await app.inject({ method: "GET", url: "/api/consumables?model=gss" });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({ detail: "Internal server error", code: "INTERNAL_ERROR" });
    });
  });

  describe("GET /api/suggestions", () => {
    it("ranks the substring match and drops the distant model", async () => {
      const response = await app.inject({ method: "GET", url: "/api/suggestions?q=gss25" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual([{ model_number: "GSS25GSHSS", brand: "GE", category: "Refrigerator" }]);
      expect(repository.calls).toEqual([
        {
          method: "findSuggestionCandidates",
          query: "gss25",
          candidateQuery: { limit: 10, minSimilarity: 0.3 },
        },
      ]);
    });

    it("returns an empty list for short or missing queries without touching the store", async () => {
      for (const url of ["/api/suggestions?q=g", "/api/suggestions?q=", "/api/suggestions"]) {
        const response = await app.inject({ method: "GET", url });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual([]);
      }
      expect(repository.calls).toEqual([]);
    });

    it("clamps the limit", async () => {
      await app.inject({ method: "GET", url: "/api/suggestions?q=gs&limit=500" });

      expect(repository.calls[0]?.candidateQuery).toEqual({ limit: 50, minSimilarity: 0.3 });
    });

    it.each(["abc", "0", "-1", "2.5", "0x10", "1e1", ""])("rejects limit=%s", async (limit) => {
      const response = await app.inject({ method: "GET", url: `/api/suggestions?q=gss25&limit=${limit}` });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: "VALIDATION_ERROR" });
      expect(repository.calls).toEqual([]);
    });
  });

  describe("GET /api/categories", () => {
    it("groups the catalog by category and brand", async () => {
      const response = await app.inject({ method: "GET", url: "/api/categories" });

      expect(response.statusCode).toBe(200);
      const body: Array<{ category: string; brands: Array<{ brand: string; appliances: Array<{ model: string }> }> }> =
        response.json();
      expect(
        body.map((group) => [
          group.category,
          group.brands.map((brand) => [brand.brand, brand.appliances.map((a) => a.model)]),
        ]),
      ).toEqual([["Refrigerator", [["GE", ["GSE25HSHSS", "GSS25GSHSS"]]]]]);
    });
  });

  describe("GET /health", () => {
    it("reports the store health", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok", database: { ok: true, issues: [] } });
    });

    it("passes schema issues through while still answering", async () => {
      repository.health = {
        ok: false,
        issues: [{ level: "error", message: "Extension pg_trgm is not installed." }],
      };

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json().database).toEqual({
        ok: false,
        issues: [{ level: "error", message: "Extension pg_trgm is not installed." }],
      });
    });
  });

  it("shows unexpected failure messages in development", async () => {
    const devApp = await createApp(loadConfig({ NODE_ENV: "development" }), { repository, logger: false });
    repository.failure = new Error('relation "models" does not exist');

    try {
      const response = await devApp.inject({ method: "GET", url: "/api/consumables?model=gss" });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({ detail: 'relation "models" does not exist', code: "INTERNAL_ERROR" });
    } finally {
      await devApp.close();
    }
  });

  it("publishes the OpenAPI document", async () => {
    const response = await app.inject({ method: "GET", url: "/api-docs/json" });

    expect(response.statusCode).toBe(200);
    expect(Object.keys(response.json().paths)).toEqual(
      expect.arrayContaining(["/api/consumables", "/api/suggestions", "/api/categories", "/health"]),
    );
  });
});
