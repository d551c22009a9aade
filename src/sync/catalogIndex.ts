import { CatalogIndex } from "../types";

export interface CategoryListing {
  name: string;
  id: string;
  count: number;
}

// Categories without documents are not tracked.
export function createCatalogIndex(listings: CategoryListing[]): CatalogIndex {
  const index: CatalogIndex = { counts: {}, categoryIds: {} };
  for (const listing of listings) {
    if (!Number.isInteger(listing.count) || listing.count <= 0) {
      continue;
    }
    index.counts[listing.name] = listing.count;
    index.categoryIds[listing.name] = listing.id;
  }
  return index;
}

export function getCategoryId(index: CatalogIndex, category: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(index.categoryIds, category) ? index.categoryIds[category] : undefined;
}
