import type { KnownWineType, Product, StoreId } from "../../types/contracts.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type WineSourceRequest = {
  query: string;
  wineType: KnownWineType;
  limit: number;
  postalCode: string;
  signal?: AbortSignal;
};

export interface WineSource {
  readonly id: StoreId;
  fetch(request: WineSourceRequest): Promise<Product[]>;
}

export type WineSourceOptions = {
  fetchImpl?: FetchLike;
  userAgent?: string;
};

/** Items a parser kept and how many it had to drop for schema drift. */
export type ParsedListing = {
  products: Product[];
  dropped: number;
  seen: number;
};
