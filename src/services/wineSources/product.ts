import type { Product, StoreId, WineType } from "../../types/contracts.js";
import { createChildLogger } from "../../utils/logger.js";
import type { ParsedListing } from "./types.js";
import { round2 } from "./payload.js";
import { extractGrape, extractRegion } from "./wineText.js";

export type ProductDraft = {
  source: StoreId;
  nativeId: string | null;
  name: string | null;
  brand?: string | null;
  price: number | null;
  pricePerLiter?: number | null;
  offerPrice?: number | null;
  discountPercent?: number | null;
  wineType: WineType;
  region?: string | null;
  url: string;
  imageUrl?: string | null;
  ean?: string | null;
  rawQuery: string;
};

const log = createChildLogger({ component: "wineSources" });

export function productId(source: StoreId, nativeId: string): string {
  return `${source}-${nativeId}`;
}

/**
 * Builds the frozen catalog record, or null when the draft has no usable id,
 * name or positive price.
 */
export function buildProduct(draft: ProductDraft): Product | null {
  const nativeId = draft.nativeId?.trim();
  const name = draft.name?.replace(/\s+/g, " ").trim();
  const price = draft.price;
  if (!nativeId || !name || price === null || !Number.isFinite(price) || price <= 0) {
    return null;
  }

  const offer = draft.offerPrice ?? null;
  const hasDiscount = offer !== null && Number.isFinite(offer) && offer > 0 && offer < price;
  const discountPercent = hasDiscount
    ? draft.discountPercent ?? Math.floor((1 - offer / price) * 100)
    : undefined;

  const product: Product = {
    id: productId(draft.source, nativeId),
    source: draft.source,
    nativeId,
    name,
    brand: draft.brand?.trim() ?? "",
    price: round2(price),
    wineType: draft.wineType,
    url: draft.url,
    rawQuery: draft.rawQuery,
    ...optional("pricePerLiter", positiveOrUndefined(draft.pricePerLiter)),
    ...optional("discountPrice", hasDiscount ? round2(offer) : undefined),
    ...optional("discountPercent", discountPercent),
    ...optional("region", draft.region?.trim() || extractRegion(name)),
    ...optional("grape", extractGrape(name)),
    ...optional("imageUrl", draft.imageUrl?.trim() || undefined),
    ...optional("ean", draft.ean?.trim() || undefined)
  };

  return Object.freeze(product);
}

function optional<K extends string, V>(key: K, value: V | undefined): { [P in K]?: V } {
  if (value === undefined) {
    return {};
  }
  const entry: { [P in K]?: V } = {};
  entry[key] = value;
  return entry;
}

function positiveOrUndefined(value: number | null | undefined): number | undefined {
  if (value === null || value === undefined || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return round2(value);
}

export function logDroppedItems(store: StoreId, query: string, listing: ParsedListing): void {
  if (listing.dropped === 0) {
    return;
  }
  log.debug({
    msg: "Dropped store items that failed to parse",
    store,
    query,
    dropped: listing.dropped,
    seen: listing.seen,
  });
}
