export const STORE_IDS = ["consum", "mercadona", "masymas", "dia"] as const;

export type StoreId = (typeof STORE_IDS)[number];

export const WINE_TYPES = ["tinto", "blanco", "rosado", "cava", "espumoso"] as const;

export type KnownWineType = (typeof WINE_TYPES)[number];

export type WineType = KnownWineType | "unknown";

export type Product = {
  readonly id: string;
  readonly source: StoreId;
  readonly nativeId: string;
  readonly name: string;
  readonly brand: string;
  readonly price: number;
  readonly pricePerLiter?: number;
  readonly discountPrice?: number;
  readonly discountPercent?: number;
  readonly wineType: WineType;
  readonly region?: string;
  readonly grape?: string;
  readonly url: string;
  readonly imageUrl?: string;
  readonly ean?: string;
  readonly rawQuery: string;
};

export type QueryPass = "standard" | "premium";

export type CatalogQuery = {
  pass: QueryPass;
  query: string;
  wineType: KnownWineType;
  limit: number;
};

export type StoreRunStats = {
  calls: number;
  failed: number;
  timedOut: number;
  products: number;
};

export type AggregationReport = {
  startedAt: string;
  durationMs: number;
  postalCode: string;
  queries: number;
  stores: Record<StoreId, StoreRunStats>;
  fetched: number;
  excluded: number;
  duplicates: number;
  total: number;
};

export type AggregationResult = {
  products: readonly Product[];
  report: AggregationReport;
};

export type CatalogState = "empty" | "loading" | "fresh" | "stale";

export type CatalogStats = {
  state: CatalogState;
  isLoading: boolean;
  size: number;
  ttlMs: number;
  lastRefreshed: string | null;
  lastAttemptAt: string | null;
  lastError: string | null;
  refreshCount: number;
  postalCode: string | null;
};

export type WineSearchRequest = {
  query?: string;
  wineType?: WineType;
  region?: string;
  store?: StoreId;
  minPrice?: number;
  maxPrice?: number;
  limit?: number;
};

export type WineSearchResponse = {
  total: number;
  wines: Product[];
  dataSource: "live" | "stale" | "empty";
  lastRefreshed: string | null;
};

export type StoreInfo = {
  id: StoreId;
  name: string;
  hasEan: boolean;
  coverage: string;
};

export function effectivePrice(product: Product): number {
  return product.discountPrice ?? product.price;
}
