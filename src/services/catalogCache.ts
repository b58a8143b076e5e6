import type {
  AggregationReport,
  AggregationResult,
  CatalogState,
  CatalogStats,
  Product
} from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ component: "catalogCache" });

export type CatalogLoader = (postalCode: string) => Promise<AggregationResult>;

export type CatalogCacheOptions = {
  load: CatalogLoader;
  ttlMs: number;
  defaultPostalCode: string;
  /** Minimum wait after a failed or empty run before another one starts. */
  retryAfterMs?: number;
  now?: () => number;
};

type CatalogEntry = {
  readonly products: readonly Product[];
  readonly lastRefreshed: number;
  readonly postalCode: string;
  readonly report: AggregationReport;
};

export type CatalogSnapshot = {
  products: readonly Product[];
  lastRefreshed: number | null;
  dataSource: "live" | "stale" | "empty";
};

/**
 * Owns the one shared catalog entry. At most one load runs at a time; stale
 * entries keep being served while it runs, and a failed or empty load never
 * replaces data that is already there.
 */
export class CatalogCache {
  private entry: CatalogEntry | null = null;
  private inFlight: Promise<void> | null = null;
  private lastAttemptAt: number | null = null;
  private lastFailureAt: number | null = null;
  private lastError: string | null = null;
  private refreshCount = 0;
  private readonly now: () => number;
  private readonly retryAfterMs: number;

  constructor(private readonly options: CatalogCacheOptions) {
    this.now = options.now ?? Date.now;
    this.retryAfterMs = options.retryAfterMs ?? 60_000;
  }

  async getCatalog(postalCode: string = this.options.defaultPostalCode): Promise<readonly Product[]> {
    const snapshot = await this.read(postalCode);
    return snapshot.products;
  }

  async read(postalCode: string = this.options.defaultPostalCode): Promise<CatalogSnapshot> {
    const current = this.entry;
    if (current && this.isFresh(current)) {
      return toSnapshot(current, "live");
    }

    if (current) {
      if (this.mayStartRefresh()) {
        // Runs in the background; refresh() settles without rejecting.
        void this.refresh(postalCode);
      }
      return toSnapshot(current, "stale");
    }

    if (this.inFlight) {
      await this.inFlight;
    } else if (this.mayStartRefresh()) {
      await this.refresh(postalCode);
    }

    const loaded = this.entry;
    return loaded
      ? toSnapshot(loaded, "live")
      : { products: [], lastRefreshed: null, dataSource: "empty" };
  }

  /** Loads now regardless of freshness or retry backoff, joining a run already in flight. */
  async forceRefresh(postalCode: string = this.options.defaultPostalCode): Promise<void> {
    await this.refresh(postalCode);
  }

  state(): CatalogState {
    if (this.inFlight) return "loading";
    if (!this.entry) return "empty";
    return this.isFresh(this.entry) ? "fresh" : "stale";
  }

  stats(): CatalogStats {
    return {
      state: this.state(),
      isLoading: this.inFlight !== null,
      size: this.entry?.products.length ?? 0,
      ttlMs: this.options.ttlMs,
      lastRefreshed: toISO(this.entry?.lastRefreshed ?? null),
      lastAttemptAt: toISO(this.lastAttemptAt),
      lastError: this.lastError,
      refreshCount: this.refreshCount,
      postalCode: this.entry?.postalCode ?? null
    };
  }

  lastReport(): AggregationReport | null {
    return this.entry?.report ?? null;
  }

  private isFresh(entry: CatalogEntry): boolean {
    return this.now() - entry.lastRefreshed < this.options.ttlMs;
  }

  private mayStartRefresh(): boolean {
    if (this.inFlight) return false;
    if (this.lastFailureAt === null) return true;
    return this.now() - this.lastFailureAt >= this.retryAfterMs;
  }

  private refresh(postalCode: string): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const run = this.load(postalCode).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async load(postalCode: string): Promise<void> {
    const startedAt = this.now();
    this.lastAttemptAt = startedAt;
    log.info({ msg: "Catalog refresh started", postalCode, hasPrevious: this.entry !== null });

    let result: AggregationResult;
    try {
      result = await this.options.load(postalCode);
    } catch (error) {
      this.recordFailure(error instanceof Error ? error.message : String(error));
      log.error({
        msg: "Catalog refresh failed",
        postalCode,
        error: error instanceof Error ? error.message : String(error),
        keptPrevious: this.entry !== null
      });
      return;
    }

    if (result.products.length === 0) {
      this.recordFailure("no_products");
      log.warn({
        msg: "Catalog refresh returned no products",
        postalCode,
        keptPrevious: this.entry !== null,
        retryAfterMs: this.retryAfterMs
      });
      return;
    }

    this.entry = {
      products: result.products,
      lastRefreshed: this.now(),
      postalCode,
      report: result.report
    };
    this.refreshCount += 1;
    this.lastFailureAt = null;
    this.lastError = null;
    log.info({
      msg: "Catalog refreshed",
      postalCode,
      size: result.products.length,
      durationMs: this.now() - startedAt
    });
  }

  private recordFailure(reason: string): void {
    this.lastFailureAt = this.now();
    this.lastError = reason;
  }
}

function toSnapshot(entry: CatalogEntry, dataSource: "live" | "stale"): CatalogSnapshot {
  return { products: entry.products, lastRefreshed: entry.lastRefreshed, dataSource };
}

function toISO(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}
