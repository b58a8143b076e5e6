import type { Product } from "../../types/contracts.js";
import { requestJSON, WineSourceError } from "./http.js";
import { firstPositive, firstText, isRecord, numericOrNull, recordOrFirst, textOf } from "./payload.js";
import { buildProduct, logDroppedItems } from "./product.js";
import type { FetchLike, ParsedListing, WineSource, WineSourceOptions, WineSourceRequest } from "./types.js";
import { extractWineType } from "./wineText.js";

const CONSUM_API_URL = "https://tienda.consum.es/api/rest/V1.0/catalog/searcher/products";
const CONSUM_PRODUCT_URL = "https://tienda.consum.es/es/p";

export class ConsumSource implements WineSource {
  readonly id = "consum";
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string | undefined;

  constructor(options: WineSourceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent;
  }

  async fetch(request: WineSourceRequest): Promise<Product[]> {
    const url = new URL(CONSUM_API_URL);
    url.searchParams.set("q", request.query);
    url.searchParams.set("limit", String(request.limit));
    url.searchParams.set("showRecommendations", "false");
    url.searchParams.set("showProducts", "true");
    url.searchParams.set("showRecipes", "false");

    const payload = await requestJSON({
      store: this.id,
      url,
      fetchImpl: this.fetchImpl,
      signal: request.signal,
      headers: this.userAgent ? { "User-Agent": this.userAgent } : {}
    });

    const listing = parseConsumListing(payload, request.query);
    if (!listing) {
      throw new WineSourceError("Unexpected Consum response shape", this.id, "invalid_payload");
    }
    logDroppedItems(this.id, request.query, listing);
    return listing.products.slice(0, request.limit);
  }
}

/** Returns null when the envelope itself is unrecognisable. */
export function parseConsumListing(payload: unknown, rawQuery: string): ParsedListing | null {
  const items = consumItems(payload);
  if (!items) {
    return null;
  }

  const products: Product[] = [];
  for (const item of items) {
    const product = parseConsumProduct(item, rawQuery);
    if (product) {
      products.push(product);
    }
  }
  return { products, dropped: items.length - products.length, seen: items.length };
}

function consumItems(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (!isRecord(payload)) {
    return null;
  }

  const catalog = payload.catalog;
  if (Array.isArray(catalog) && catalog.length > 0) {
    return catalog;
  }
  if (isRecord(catalog) && Array.isArray(catalog.products) && catalog.products.length > 0) {
    return catalog.products;
  }
  for (const key of ["products", "results", "items"]) {
    const candidate = payload[key];
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return isRecord(catalog) || Array.isArray(catalog) ? [] : null;
}

export function parseConsumProduct(raw: unknown, rawQuery: string): Product | null {
  const item = recordOrFirst(raw);
  if (!item) {
    return null;
  }

  const productData: Record<string, unknown> = recordOrFirst(item.productData) ?? {};
  const nativeId = firstText([item.id]);
  const name = textOf(productData.name) ?? firstText([textOf(item.name), textOf(item.displayName), textOf(item.title)]);
  const brand = textOf(productData.brand, ["name", "id"]) ?? textOf(item.brand, ["name", "id"]) ?? textOf(item.manufacturer, ["name", "id"]);
  const ean = textOf(productData.ean, ["value", "code"]) ?? textOf(item.ean, ["value", "code"]) ?? textOf(item.gtin, ["value", "code"]);

  const priceData: Record<string, unknown> = recordOrFirst(item.priceData) ?? {};
  const { regular, unit, offer } = readAktiosPrices(priceData.prices);
  const price = regular ?? firstPositive([priceData.price, priceData.unitPrice, item.price, item.unitPrice]);
  const pricePerLiter = unit ?? firstPositive([item.pricePerUnit, item.referencePrice]);
  const firstOffer = recordOrFirst(priceData.offers);
  const offerPrice = offer ?? (firstOffer ? numericOrNull(firstOffer.price) : null);

  const slug = textOf(productData.slug, ["value", "url"]) ?? textOf(item.slug, ["value"]);
  const url = slug && nativeId
    ? `${CONSUM_PRODUCT_URL}/${slug}/${nativeId}`
    : `${CONSUM_PRODUCT_URL}/${nativeId ?? ""}`;
  const imageUrl =
    textOf(productData.imageURL, ["url", "src"]) ??
    textOf(productData.image, ["url", "src"]) ??
    textOf(item.imageURL, ["url", "src"]) ??
    textOf(item.image, ["url", "src"]) ??
    textOf(item.thumbnail, ["url", "src"]);

  return buildProduct({
    source: "consum",
    nativeId,
    name,
    brand,
    price,
    pricePerLiter,
    offerPrice,
    wineType: (name && extractWineType(name)) || "unknown",
    url,
    imageUrl,
    ean,
    rawQuery
  });
}

type AktiosPrices = {
  regular: number | null;
  unit: number | null;
  offer: number | null;
};

/**
 * Consum and Masymas share one storefront platform. Prices arrive as
 * `[{ id: "PRICE" | "OFFER_PRICE", value: { centAmount, centUnitAmount } }]`
 * (amounts are euros despite the name) or, on older payloads, as one object.
 */
export function readAktiosPrices(prices: unknown): AktiosPrices {
  const result: AktiosPrices = { regular: null, unit: null, offer: null };
  const entries: unknown[] = Array.isArray(prices) ? prices : isRecord(prices) ? [prices] : [];
  let hasExplicitPrice = false;

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const value: Record<string, unknown> = isRecord(entry.value) ? entry.value : {};
    const amount = firstPositive([value.centAmount, entry.price]);
    const unitAmount = firstPositive([value.centUnitAmount, entry.pricePerUnit]);
    const kind = typeof entry.id === "string" ? entry.id.toUpperCase() : "";

    if (kind === "OFFER_PRICE") {
      if (result.offer === null) result.offer = amount;
    } else if (kind === "PRICE") {
      hasExplicitPrice = true;
      result.regular = amount;
      result.unit = unitAmount;
    } else if (!hasExplicitPrice && result.regular === null) {
      result.regular = amount;
      result.unit = unitAmount;
    }
  }

  return result;
}
