import type {
  AggregationReport,
  AggregationResult,
  CatalogQuery,
  KnownWineType,
  Product,
  StoreId,
  StoreRunStats
} from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { dedupeProducts } from "./catalogDedupe.js";
import { excludeProducts, type ExclusionFilter } from "./exclusionFilter.js";
import { WineSourceError } from "./wineSources/http.js";
import type { WineSource } from "./wineSources/types.js";

const log = createChildLogger({ component: "catalogAggregator" });

type QueryTerm = { query: string; wineType: KnownWineType };

export const STANDARD_QUERIES: readonly QueryTerm[] = [
  { query: "vino tinto", wineType: "tinto" },
  { query: "vino blanco", wineType: "blanco" },
  { query: "vino rosado", wineType: "rosado" },
  { query: "vino cava", wineType: "cava" }
];

export const PREMIUM_QUERIES: readonly QueryTerm[] = [
  { query: "reserva", wineType: "tinto" },
  { query: "gran reserva", wineType: "tinto" },
  { query: "crianza rioja", wineType: "tinto" },
  { query: "ribera del duero", wineType: "tinto" },
  { query: "priorat", wineType: "tinto" },
  { query: "toro", wineType: "tinto" },
  { query: "albariño", wineType: "blanco" },
  { query: "verdejo rueda", wineType: "blanco" },
  { query: "godello", wineType: "blanco" },
  { query: "brut nature", wineType: "cava" }
];

export type QueryPlanOptions = {
  standardLimit: number;
  premiumLimit: number;
};

/** Standard queries first, then premium ones; this order drives dedupe. */
export function buildQueryPlan(options: QueryPlanOptions): CatalogQuery[] {
  return [
    ...STANDARD_QUERIES.map((term) => ({ pass: "standard" as const, ...term, limit: options.standardLimit })),
    ...PREMIUM_QUERIES.map((term) => ({ pass: "premium" as const, ...term, limit: options.premiumLimit }))
  ];
}

export type CatalogAggregatorOptions = {
  sources: readonly WineSource[];
  timeoutMs: number;
  standardLimit?: number;
  premiumLimit?: number;
  plan?: readonly CatalogQuery[];
  exclusionFilter?: ExclusionFilter;
  now?: () => number;
};

type CallStatus = "ok" | "failed" | "timeout";

type CallOutcome = {
  store: StoreId;
  status: CallStatus;
  products: readonly Product[];
};

export class CatalogAggregator {
  private readonly plan: readonly CatalogQuery[];
  private readonly now: () => number;

  constructor(private readonly options: CatalogAggregatorOptions) {
    this.plan = options.plan ?? buildQueryPlan({
      standardLimit: options.standardLimit ?? 80,
      premiumLimit: options.premiumLimit ?? 40
    });
    this.now = options.now ?? Date.now;
  }

  /**
   * Runs every (query, store) pair concurrently and merges the results.
   * Store failures and timeouts contribute nothing; this never rejects.
   */
  async aggregate(postalCode: string): Promise<AggregationResult> {
    const startedAt = this.now();
    const calls = this.plan.flatMap((query) =>
      this.options.sources.map((source) => this.runCall(source, query, postalCode))
    );
    const outcomes = await Promise.all(calls);

    const stores = emptyStoreStats();
    for (const outcome of outcomes) {
      const stats = stores[outcome.store];
      stats.calls += 1;
      stats.products += outcome.products.length;
      if (outcome.status === "failed") stats.failed += 1;
      if (outcome.status === "timeout") stats.timedOut += 1;
    }

    const fetched = outcomes.flatMap((outcome) => outcome.products);
    const { kept, excluded } = excludeProducts(fetched, this.options.exclusionFilter);
    const { unique, duplicates } = dedupeProducts(kept);

    const report: AggregationReport = {
      startedAt: new Date(startedAt).toISOString(),
      durationMs: this.now() - startedAt,
      postalCode,
      queries: this.plan.length,
      stores,
      fetched: fetched.length,
      excluded,
      duplicates,
      total: unique.length
    };

    if (unique.length === 0) {
      log.warn({ msg: "Catalog aggregation returned no products", postalCode, stores });
    } else {
      log.info({
        msg: "Catalog aggregation finished",
        postalCode,
        total: unique.length,
        fetched: report.fetched,
        excluded,
        duplicates,
        durationMs: report.durationMs
      });
    }

    return { products: Object.freeze(unique), report };
  }

  private async runCall(source: WineSource, query: CatalogQuery, postalCode: string): Promise<CallOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve("timeout");
      }, this.options.timeoutMs);
    });

    try {
      const result = await Promise.race([
        source.fetch({
          query: query.query,
          wineType: query.wineType,
          limit: query.limit,
          postalCode,
          signal: controller.signal
        }),
        timedOut
      ]);

      if (result === "timeout") {
        log.warn({ msg: "Store request timed out", store: source.id, query: query.query, timeoutMs: this.options.timeoutMs });
        return { store: source.id, status: "timeout", products: [] };
      }
      return { store: source.id, status: "ok", products: result.slice(0, query.limit) };
    } catch (error) {
      const code = error instanceof WineSourceError ? error.code : "unexpected_error";
      const status: CallStatus = controller.signal.aborted ? "timeout" : "failed";
      log.warn({
        msg: "Store request failed",
        store: source.id,
        query: query.query,
        code,
        error: error instanceof Error ? error.message : String(error)
      });
      return { store: source.id, status, products: [] };
    } finally {
      clearTimeout(timer);
    }
  }
}

function emptyStoreStats(): Record<StoreId, StoreRunStats> {
  const zero = (): StoreRunStats => ({ calls: 0, failed: 0, timedOut: 0, products: 0 });
  return { consum: zero(), mercadona: zero(), masymas: zero(), dia: zero() };
}
