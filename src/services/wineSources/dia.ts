import * as cheerio from "cheerio";
import type { KnownWineType, Product } from "../../types/contracts.js";
import { requestText } from "./http.js";
import { buildProduct, logDroppedItems } from "./product.js";
import type { FetchLike, ParsedListing, WineSource, WineSourceOptions, WineSourceRequest } from "./types.js";
import { extractDiaBrand, extractWineType, parseSpanishPrice } from "./wineText.js";

const DIA_BASE_URL = "https://www.dia.es";
const DIA_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

const SELECTORS = {
  card: '[data-test-id="search-product-card-list-item"]',
  name: '[data-test-id="search-product-card-name"]',
  image: '[data-test-id="search-product-card-image"]',
  unitPrice: '[data-test-id="search-product-card-unit-price"]',
  literPrice: '[data-test-id="search-product-card-kilo-price"]',
  strikethrough: '[data-test-id="product-special-offer-discount-percentage-strikethrough-price"]',
  discount: '[data-test-id="product-special-offer-discount-percentage-discount"]'
} as const;

/**
 * DIA has no public search API; the search page is server-rendered and its
 * product cards carry stable `data-test-id` attributes.
 */
export class DiaSource implements WineSource {
  readonly id = "dia";
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;

  constructor(options: WineSourceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent ?? DIA_USER_AGENT;
  }

  async fetch(request: WineSourceRequest): Promise<Product[]> {
    const url = new URL(`${DIA_BASE_URL}/search`);
    url.searchParams.set("q", request.query);

    const html = await requestText({
      store: this.id,
      url,
      fetchImpl: this.fetchImpl,
      signal: request.signal,
      headers: { "User-Agent": this.userAgent }
    });

    const listing = parseDiaSearchHTML(html, request.query, request.wineType, request.limit);
    logDroppedItems(this.id, request.query, listing);
    return listing.products;
  }
}

export function parseDiaSearchHTML(
  html: string,
  rawQuery: string,
  searchType: KnownWineType,
  limit: number = Number.POSITIVE_INFINITY
): ParsedListing {
  const $ = cheerio.load(html);
  const cards = $(SELECTORS.card).toArray().slice(0, limit);
  const products: Product[] = [];

  for (const card of cards) {
    const $card = $(card);
    const nameEl = $card.find(SELECTORS.name).first();
    const name = nameEl.text().trim();
    const href = nameEl.attr("href") ?? "";
    const nativeId = href.includes("/p/") ? href.split("/p/").pop()?.replace(/\/+$/, "") ?? null : null;

    let price = parseSpanishPrice($card.find(SELECTORS.unitPrice).first().text());
    let offerPrice: number | null = null;
    let discountPercent: number | null = null;

    const strikeText = $card.find(SELECTORS.strikethrough).first().text();
    const discountText = $card.find(SELECTORS.discount).first().text();
    if (strikeText && discountText && price !== null) {
      const original = parseSpanishPrice(strikeText);
      if (original !== null && original > price) {
        offerPrice = price;
        price = original;
        const pct = discountText.match(/(\d+)\s*%/);
        discountPercent = pct?.[1] ? Number(pct[1]) : null;
      }
    }

    const product = buildProduct({
      source: "dia",
      nativeId,
      name,
      brand: name ? extractDiaBrand(name) : null,
      price,
      offerPrice,
      discountPercent,
      pricePerLiter: parseSpanishPrice($card.find(SELECTORS.literPrice).first().text()),
      wineType: extractWineType(name) ?? searchType,
      url: absoluteURL(href),
      imageUrl: absoluteURL($card.find(SELECTORS.image).first().attr("src") ?? "") || null,
      rawQuery
    });
    if (product) {
      products.push(product);
    }
  }

  return { products, dropped: cards.length - products.length, seen: cards.length };
}

function absoluteURL(pathOrURL: string): string {
  if (!pathOrURL) return "";
  return pathOrURL.startsWith("/") ? `${DIA_BASE_URL}${pathOrURL}` : pathOrURL;
}
