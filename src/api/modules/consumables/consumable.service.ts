import type { ApplianceResult, StoreCallOptions } from "../../../catalog/catalog.types";
import { groupAppliances } from "../../../catalog/appliance.grouping";
import type { CatalogRepository } from "../../../repository/catalog.repository";
import { throwIfAborted } from "../../core/database/session";
import { InvalidQueryError } from "../../core/errors/app-error";

/**
 * Model-number lookup: plain case-insensitive substring containment,
 * one entry per matching model with its consumables.
 */
export class ConsumableService {
  constructor(private readonly repository: CatalogRepository) {}

  async searchConsumables(query: string | undefined, options: StoreCallOptions = {}): Promise<ApplianceResult[]> {
    const normalizedQuery = (query ?? "").trim().toLowerCase();
    if (!normalizedQuery) {
      throw new InvalidQueryError();
    }

    throwIfAborted(options.signal);
    const rows = await this.repository.findApplianceRows(normalizedQuery, options);
    throwIfAborted(options.signal);

    return groupAppliances(
      rows.filter((row) => row.modelNumber.toLowerCase().includes(normalizedQuery)),
    );
  }
}
