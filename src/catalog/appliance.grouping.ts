import type {
  ApplianceConsumableRow,
  ApplianceResult,
  CategoryGroup,
  ConsumableResult,
} from "./catalog.types";
import { compareIds, compareModels, compareText } from "./ordering";

interface ApplianceBucket {
  head: ApplianceConsumableRow;
  consumables: Array<{ id: string; result: ConsumableResult }>;
}

function toAppliance(bucket: ApplianceBucket): ApplianceResult {
  const consumables = [...bucket.consumables]
    .sort((a, b) => compareText(a.result.name, b.result.name) || compareIds(a.id, b.id))
    .map((entry) => entry.result);

  return {
    brand: bucket.head.brand,
    category: bucket.head.category,
    model: bucket.head.modelNumber,
    water_filter_missing: bucket.head.waterFilterMissing,
    consumables,
  };
}

function collectBuckets(rows: ApplianceConsumableRow[]): ApplianceBucket[] {
  const buckets = new Map<string, ApplianceBucket>();

  for (const row of rows) {
    let bucket = buckets.get(row.modelId);
    if (!bucket) {
      bucket = { head: row, consumables: [] };
      buckets.set(row.modelId, bucket);
    }

    // LEFT JOIN row of a model without pairings
    if (row.consumableId === null || row.consumableName === null) continue;

    bucket.consumables.push({
      id: row.consumableId,
      result: {
        name: row.consumableName,
        type: row.consumableType ?? "",
        sku: row.sku,
        asin: row.asin,
        purchase_url: row.purchaseUrl,
        notes: row.notes,
      },
    });
  }

  return [...buckets.values()].sort((a, b) => compareModels(a.head, b.head));
}

/**
 * Folds (model, consumable) rows into one entry per model, ordered by
 * model number. Row order coming from the store does not matter.
 */
export function groupAppliances(rows: ApplianceConsumableRow[]): ApplianceResult[] {
  return collectBuckets(rows).map(toAppliance);
}

/**
 * Category → brand → appliance tree for the browse view.
 */
export function groupByCategory(rows: ApplianceConsumableRow[]): CategoryGroup[] {
  const categories = new Map<string, Map<string, ApplianceResult[]>>();

  for (const bucket of collectBuckets(rows)) {
    const { category, brand } = bucket.head;
    let brands = categories.get(category);
    if (!brands) {
      brands = new Map();
      categories.set(category, brands);
    }
    const appliances = brands.get(brand) ?? [];
    appliances.push(toAppliance(bucket));
    brands.set(brand, appliances);
  }

  return [...categories.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([category, brands]) => ({
      category,
      brands: [...brands.entries()]
        .sort(([a], [b]) => compareText(a, b))
        .map(([brand, appliances]) => ({ brand, appliances })),
    }));
}
