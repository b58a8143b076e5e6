import type { Product } from "../../types/contracts.js";
import { requestJSON, WineSourceError } from "./http.js";
import { firstText, isRecord, numericOrNull, sanitizeText } from "./payload.js";
import { buildProduct, logDroppedItems } from "./product.js";
import type { FetchLike, ParsedListing, WineSource, WineSourceOptions, WineSourceRequest } from "./types.js";
import { extractWineType } from "./wineText.js";

const MERCADONA_PRODUCT_URL = "https://tienda.mercadona.es/product";

// Province prefix of the postal code → Mercadona warehouse index.
const WAREHOUSES_BY_PROVINCE: Readonly<Record<string, string>> = {
  "46": "vlc1",
  "03": "vlc1",
  "12": "vlc1",
  "28": "mad1",
  "08": "bcn1",
  "41": "svq1",
  "29": "agp1"
};

export type MercadonaSourceOptions = WineSourceOptions & {
  algoliaAppId?: string;
  algoliaApiKey?: string;
  defaultWarehouse?: string;
};

export class MercadonaSource implements WineSource {
  readonly id = "mercadona";
  private readonly fetchImpl: FetchLike;
  private readonly appId: string | undefined;
  private readonly apiKey: string | undefined;
  private readonly defaultWarehouse: string;

  constructor(options: MercadonaSourceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.appId = options.algoliaAppId;
    this.apiKey = options.algoliaApiKey;
    this.defaultWarehouse = options.defaultWarehouse ?? "vlc1";
  }

  async fetch(request: WineSourceRequest): Promise<Product[]> {
    if (!this.appId || !this.apiKey) {
      throw new WineSourceError("Mercadona Algolia credentials are not configured", this.id, "not_configured");
    }

    const warehouse = warehouseForPostalCode(request.postalCode, this.defaultWarehouse);
    const endpoint =
      `https://${this.appId.toLowerCase()}-dsn.algolia.net/1/indexes/products_prod_${warehouse}_es/query`;

    const payload = await requestJSON({
      store: this.id,
      url: endpoint,
      fetchImpl: this.fetchImpl,
      signal: request.signal,
      headers: {
        "x-algolia-api-key": this.apiKey,
        "x-algolia-application-id": this.appId
      },
      body: {
        query: request.query,
        hitsPerPage: request.limit,
        page: 0
      }
    });

    const listing = parseMercadonaHits(payload, request.query);
    if (!listing) {
      throw new WineSourceError("Unexpected Mercadona response shape", this.id, "invalid_payload");
    }
    logDroppedItems(this.id, request.query, listing);
    return listing.products.slice(0, request.limit);
  }
}

export function warehouseForPostalCode(postalCode: string, fallback: string = "vlc1"): string {
  const province = postalCode.trim().slice(0, 2);
  return WAREHOUSES_BY_PROVINCE[province] ?? fallback;
}

export function parseMercadonaHits(payload: unknown, rawQuery: string): ParsedListing | null {
  if (!isRecord(payload) || !Array.isArray(payload.hits)) {
    return null;
  }

  const hits: unknown[] = payload.hits;
  const products: Product[] = [];
  for (const hit of hits) {
    const product = parseMercadonaHit(hit, rawQuery);
    if (product) {
      products.push(product);
    }
  }
  return { products, dropped: hits.length - products.length, seen: hits.length };
}

export function parseMercadonaHit(hit: unknown, rawQuery: string): Product | null {
  if (!isRecord(hit)) {
    return null;
  }

  const nativeId = firstText([hit.id]);
  const name = firstText([hit.display_name]);
  const priceInfo = isRecord(hit.price_instructions) ? hit.price_instructions : null;
  if (!priceInfo) {
    return null;
  }

  const unitPrice = numericOrNull(priceInfo.unit_price);
  const previousPrice = numericOrNull(priceInfo.previous_unit_price);
  const onOffer = previousPrice !== null && previousPrice > 0;

  return buildProduct({
    source: "mercadona",
    nativeId,
    name,
    brand: sanitizeText(hit.brand),
    price: onOffer ? previousPrice : unitPrice,
    offerPrice: onOffer ? unitPrice : null,
    pricePerLiter: numericOrNull(priceInfo.reference_price),
    wineType: (name && extractWineType(name)) || "unknown",
    url: sanitizeText(hit.share_url) ?? `${MERCADONA_PRODUCT_URL}/${nativeId ?? ""}`,
    imageUrl: sanitizeText(hit.thumbnail),
    rawQuery
  });
}
