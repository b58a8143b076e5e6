import type { Product } from "../types/contracts.js";

/**
 * Keeps the first product seen for each id. Ids already embed the store, so
 * equal native ids from different stores never collapse.
 */
export function dedupeProducts(products: readonly Product[]): { unique: Product[]; duplicates: number } {
  const byId = new Map<string, Product>();
  for (const product of products) {
    if (!byId.has(product.id)) {
      byId.set(product.id, product);
    }
  }
  const unique = Array.from(byId.values());
  return { unique, duplicates: products.length - unique.length };
}
