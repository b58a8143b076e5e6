import type { KnownWineType, Product } from "../../types/contracts.js";
import { readAktiosPrices } from "./consum.js";
import { requestJSON, WineSourceError } from "./http.js";
import { firstText, isRecord, textOf } from "./payload.js";
import { buildProduct, logDroppedItems } from "./product.js";
import type { FetchLike, ParsedListing, WineSource, WineSourceOptions, WineSourceRequest } from "./types.js";
import { extractWineType, regionFromCategory } from "./wineText.js";

const MASYMAS_BASE_URL = "https://tienda.masymas.com";
const MASYMAS_API_URL = `${MASYMAS_BASE_URL}/api/rest/V1.0/catalog/searcher/products`;
const MASYMAS_MAX_PAGE_SIZE = 40;

export class MasymasSource implements WineSource {
  readonly id = "masymas";
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string | undefined;

  constructor(options: WineSourceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent;
  }

  async fetch(request: WineSourceRequest): Promise<Product[]> {
    const url = new URL(MASYMAS_API_URL);
    url.searchParams.set("q", request.query);
    url.searchParams.set("limit", String(Math.min(request.limit, MASYMAS_MAX_PAGE_SIZE)));
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

    const listing = parseMasymasListing(payload, request.query, request.wineType);
    if (!listing) {
      throw new WineSourceError("Unexpected Masymas response shape", this.id, "invalid_payload");
    }
    logDroppedItems(this.id, request.query, listing);
    return listing.products.slice(0, request.limit);
  }
}

export function parseMasymasListing(
  payload: unknown,
  rawQuery: string,
  searchType: KnownWineType
): ParsedListing | null {
  if (!isRecord(payload) || !isRecord(payload.catalog)) {
    return null;
  }

  const items: unknown[] = Array.isArray(payload.catalog.products) ? payload.catalog.products : [];
  const products: Product[] = [];
  for (const item of items) {
    const product = parseMasymasProduct(item, rawQuery, searchType);
    if (product) {
      products.push(product);
    }
  }
  return { products, dropped: items.length - products.length, seen: items.length };
}

export function parseMasymasProduct(raw: unknown, rawQuery: string, searchType: KnownWineType): Product | null {
  if (!isRecord(raw) || !isRecord(raw.productData)) {
    return null;
  }

  const productData = raw.productData;
  const nativeId = firstText([raw.id]);
  const name = firstText([productData.name]);
  const priceData = isRecord(raw.priceData) ? raw.priceData : null;
  const { regular, unit, offer } = readAktiosPrices(priceData?.prices);

  const categories: unknown[] = Array.isArray(raw.categories) ? raw.categories : [];
  let region: string | undefined;
  for (const category of categories) {
    const categoryName = isRecord(category) ? firstText([category.name]) : null;
    region = categoryName ? regionFromCategory(categoryName) : undefined;
    if (region) break;
  }

  return buildProduct({
    source: "masymas",
    nativeId,
    name,
    brand: textOf(productData.brand, ["name"]),
    price: regular,
    pricePerLiter: unit,
    offerPrice: offer,
    wineType: (name && extractWineType(name)) || searchType,
    region,
    url: firstText([productData.url]) ?? `${MASYMAS_BASE_URL}/es/p/${nativeId ?? ""}`,
    imageUrl: firstText([productData.imageURL]),
    ean: firstText([raw.ean]),
    rawQuery
  });
}
