import type { Env } from "../../config/env.js";
import type { StoreId, StoreInfo } from "../../types/contracts.js";
import { ConsumSource } from "./consum.js";
import { DiaSource } from "./dia.js";
import { MasymasSource } from "./masymas.js";
import { MercadonaSource } from "./mercadona.js";
import type { FetchLike, WineSource } from "./types.js";

export const storeDirectory: Readonly<Record<StoreId, StoreInfo>> = {
  consum: {
    id: "consum",
    name: "Consum",
    hasEan: true,
    coverage: "Valencia, Cataluña, Murcia, Castilla-La Mancha"
  },
  mercadona: {
    id: "mercadona",
    name: "Mercadona",
    hasEan: false,
    coverage: "Toda España"
  },
  masymas: {
    id: "masymas",
    name: "Masymas",
    hasEan: true,
    coverage: "Valencia, Alicante, Murcia"
  },
  dia: {
    id: "dia",
    name: "DIA",
    hasEan: false,
    coverage: "Toda España"
  }
};

type SourceEnv = Pick<
  Env,
  "SOURCE_USER_AGENT" | "MERCADONA_ALGOLIA_APP_ID" | "MERCADONA_ALGOLIA_API_KEY" | "MERCADONA_DEFAULT_WAREHOUSE"
>;

/** Sources in the fixed order used for dedupe tie-breaking. */
export function createWineSources(env: SourceEnv, fetchImpl?: FetchLike): WineSource[] {
  return [
    new ConsumSource({ fetchImpl, userAgent: env.SOURCE_USER_AGENT }),
    new MercadonaSource({
      fetchImpl,
      algoliaAppId: env.MERCADONA_ALGOLIA_APP_ID,
      algoliaApiKey: env.MERCADONA_ALGOLIA_API_KEY,
      defaultWarehouse: env.MERCADONA_DEFAULT_WAREHOUSE
    }),
    new MasymasSource({ fetchImpl, userAgent: env.SOURCE_USER_AGENT }),
    new DiaSource({ fetchImpl })
  ];
}
