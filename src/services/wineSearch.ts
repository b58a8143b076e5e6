import { effectivePrice, type Product, type WineSearchRequest } from "../types/contracts.js";
import { normalizeForMatch } from "../utils/normalize.js";

export const DEFAULT_SEARCH_LIMIT = 30;
export const MAX_SEARCH_LIMIT = 200;

/** Filters the cached catalog and sorts it by the price a shopper pays today. */
export function searchWines(catalog: readonly Product[], request: WineSearchRequest): { total: number; wines: Product[] } {
  const query = request.query ? normalizeForMatch(request.query) : "";
  const region = request.region ? normalizeForMatch(request.region) : "";
  const minPrice = request.minPrice ?? 0;
  const maxPrice = request.maxPrice ?? Number.POSITIVE_INFINITY;
  const limit = clampLimit(request.limit);

  const matches = catalog.filter((wine) => {
    if (query && !normalizeForMatch(`${wine.name} ${wine.brand}`).includes(query)) return false;
    if (request.wineType && wine.wineType !== request.wineType) return false;
    if (region && !(wine.region && normalizeForMatch(wine.region).includes(region))) return false;
    if (request.store && wine.source !== request.store) return false;
    const price = effectivePrice(wine);
    return price >= minPrice && price <= maxPrice;
  });

  matches.sort((left, right) => effectivePrice(left) - effectivePrice(right));

  return { total: matches.length, wines: matches.slice(0, limit) };
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_SEARCH_LIMIT;
  }
  return Math.min(MAX_SEARCH_LIMIT, Math.max(1, Math.floor(limit)));
}
