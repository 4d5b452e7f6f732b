import type { CategoryGroup, StoreCallOptions } from "../../../catalog/catalog.types";
import { groupByCategory } from "../../../catalog/appliance.grouping";
import type { CatalogRepository } from "../../../repository/catalog.repository";
import { throwIfAborted } from "../../core/database/session";

/**
 * Browse view: the whole catalog as category → brand → appliances
 */
export class CategoryService {
  constructor(private readonly repository: CatalogRepository) {}

  async browse(options: StoreCallOptions = {}): Promise<CategoryGroup[]> {
    throwIfAborted(options.signal);
    const rows = await this.repository.listApplianceRows(options);
    throwIfAborted(options.signal);
    return groupByCategory(rows);
  }
}
