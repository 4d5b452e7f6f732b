import { describe, expect, it } from "vitest";
import type { ApplianceConsumableRow } from "./catalog.types";
import { groupAppliances, groupByCategory } from "./appliance.grouping";

function row(overrides: Partial<ApplianceConsumableRow> & Pick<ApplianceConsumableRow, "modelId" | "modelNumber" | "brand" | "category">): ApplianceConsumableRow {
  return {
    waterFilterMissing: false,
    consumableId: null,
    consumableName: null,
    consumableType: null,
    sku: null,
    asin: null,
    purchaseUrl: null,
    notes: null,
    ...overrides,
  };
}

const rows: ApplianceConsumableRow[] = [
  row({
    modelId: "3",
    modelNumber: "GSS25GSHSS",
    brand: "Hotpoint",
    category: "Refrigerator",
    consumableId: "30",
    consumableName: "Water Filter",
    consumableType: "filter",
    asin: "B000TEST01",
  }),
  row({
    modelId: "2",
    modelNumber: "GSS25GSHSS",
    brand: "GE",
    category: "Refrigerator",
    consumableId: "20",
    consumableName: "Water Filter",
    consumableType: "filter",
    sku: "WF001",
    purchaseUrl: "https://example.com/wf001",
    notes: "Quarter turn to lock",
  }),
  row({ modelId: "1", modelNumber: "ABC100", brand: "Whirlpool", category: "Dishwasher", waterFilterMissing: true }),
  row({
    modelId: "2",
    modelNumber: "GSS25GSHSS",
    brand: "GE",
    category: "Refrigerator",
    consumableId: "21",
    consumableName: "Air Filter",
    consumableType: "filter",
    sku: "AF002",
  }),
];

describe("groupAppliances", () => {
  it("folds rows into one entry per model, ordered by model number then brand", () => {
    const appliances = groupAppliances(rows);

    expect(appliances.map((a) => `${a.model}/${a.brand}`)).toEqual([
      "ABC100/Whirlpool",
      "GSS25GSHSS/GE",
      "GSS25GSHSS/Hotpoint",
    ]);
  });

  it("carries per-pairing notes and sorts consumables by name", () => {
    const ge = groupAppliances(rows)[1];

    expect(ge).toEqual({
      brand: "GE",
      category: "Refrigerator",
      model: "GSS25GSHSS",
      water_filter_missing: false,
      consumables: [
        { name: "Air Filter", type: "filter", sku: "AF002", asin: null, purchase_url: null, notes: null },
        {
          name: "Water Filter",
          type: "filter",
          sku: "WF001",
          asin: null,
          purchase_url: "https://example.com/wf001",
          notes: "Quarter turn to lock",
        },
      ],
    });
  });

  it("keeps a model without consumables with an empty list", () => {
    expect(groupAppliances(rows)[0]).toEqual({
      brand: "Whirlpool",
      category: "Dishwasher",
      model: "ABC100",
      water_filter_missing: true,
      consumables: [],
    });
  });

  it("returns an empty list for no rows", () => {
    expect(groupAppliances([])).toEqual([]);
  });
});

describe("groupByCategory", () => {
  it("nests appliances under category and brand, both sorted by name", () => {
    const groups = groupByCategory(rows);

    expect(
      groups.map((g) => ({
        category: g.category,
        brands: g.brands.map((b) => [b.brand, b.appliances.map((a) => a.model)]),
      })),
    ).toEqual([
      { category: "Dishwasher", brands: [["Whirlpool", ["ABC100"]]] },
      {
        category: "Refrigerator",
        brands: [
          ["GE", ["GSS25GSHSS"]],
          ["Hotpoint", ["GSS25GSHSS"]],
        ],
      },
    ]);
  });
});
