import test from "node:test";
import assert from "node:assert/strict";
import { buildQueryPlan, CatalogAggregator } from "../src/services/catalogAggregator.js";
import { WineSourceError } from "../src/services/wineSources/http.js";
import type { WineSource, WineSourceRequest } from "../src/services/wineSources/types.js";
import type { CatalogQuery, Product, StoreId } from "../src/types/contracts.js";
import { makeProduct } from "./fixtures/products.js";

// ── helpers ────────────────────────────────────────────────────────────────

function source(id: StoreId, respond: (request: WineSourceRequest) => Promise<Product[]>): WineSource {
  return { id, fetch: respond };
}

function staticSource(id: StoreId, products: Product[]): WineSource {
  return source(id, async () => products);
}

function failingSource(id: StoreId): WineSource {
  return source(id, async () => {
    throw new WineSourceError("Store API responded with status 503", id, "http_status", 503);
  });
}

const singleQuery: CatalogQuery[] = [{ pass: "standard", query: "vino tinto", wineType: "tinto", limit: 10 }];

// ── query plan ─────────────────────────────────────────────────────────────

test("buildQueryPlan runs standard queries before premium ones", () => {
  const plan = buildQueryPlan({ standardLimit: 80, premiumLimit: 40 });

  assert.equal(plan.length, 14);
  assert.deepEqual(
    plan.slice(0, 4).map((query) => query.query),
    ["vino tinto", "vino blanco", "vino rosado", "vino cava"]
  );
  assert.ok(plan.slice(0, 4).every((query) => query.pass === "standard" && query.limit === 80));
  assert.ok(plan.slice(4).every((query) => query.pass === "premium" && query.limit === 40));
});

test("the default plan calls every store for every query", async () => {
  let calls = 0;
  const counting = (id: StoreId) =>
    source(id, async () => {
      calls += 1;
      return [];
    });
  const aggregator = new CatalogAggregator({
    sources: [counting("consum"), counting("mercadona"), counting("masymas"), counting("dia")],
    timeoutMs: 1000
  });

  const { report } = await aggregator.aggregate("46001");

  assert.equal(calls, 56);
  assert.equal(report.queries, 14);
  assert.equal(report.stores.dia.calls, 14);
});

// ── merging ────────────────────────────────────────────────────────────────

test("a failing store contributes nothing while the others merge", async () => {
  const aggregator = new CatalogAggregator({
    sources: [
      staticSource("consum", [makeProduct("consum", "c1"), makeProduct("consum", "c2")]),
      failingSource("mercadona"),
      staticSource("masymas", []),
      staticSource("dia", [makeProduct("dia", "c1")])
    ],
    timeoutMs: 1000,
    plan: singleQuery
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.deepEqual(products.map((product) => product.id), ["consum-c1", "consum-c2", "dia-c1"]);
  assert.equal(report.total, 3);
  assert.equal(report.fetched, 3);
  assert.equal(report.postalCode, "46001");
  assert.deepEqual(report.stores.mercadona, { calls: 1, failed: 1, timedOut: 0, products: 0 });
  assert.deepEqual(report.stores.consum, { calls: 1, failed: 0, timedOut: 0, products: 2 });
});

test("the first occurrence in plan order wins", async () => {
  const dia = source("dia", async (request) => [
    makeProduct("dia", "123", { rawQuery: request.query, price: request.query === "vino tinto" ? 4 : 6 })
  ]);
  const aggregator = new CatalogAggregator({
    sources: [dia],
    timeoutMs: 1000,
    plan: [
      { pass: "standard", query: "vino tinto", wineType: "tinto", limit: 10 },
      { pass: "premium", query: "reserva", wineType: "tinto", limit: 10 }
    ]
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.equal(products.length, 1);
  assert.equal(products[0]?.id, "dia-123");
  assert.equal(products[0]?.rawQuery, "vino tinto");
  assert.equal(products[0]?.price, 4);
  assert.equal(report.duplicates, 1);
});

test("excluded groceries are dropped before dedupe", async () => {
  const aggregator = new CatalogAggregator({
    sources: [
      staticSource("consum", [
        makeProduct("consum", "1", { name: "Jamón ibérico reserva" }),
        makeProduct("consum", "2", { name: "Rioja Reserva" })
      ])
    ],
    timeoutMs: 1000,
    plan: singleQuery
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.deepEqual(products.map((product) => product.id), ["consum-2"]);
  assert.equal(report.excluded, 1);
});

test("each call is truncated to its query limit", async () => {
  const many = Array.from({ length: 5 }, (_, index) => makeProduct("masymas", String(index)));
  const aggregator = new CatalogAggregator({
    sources: [staticSource("masymas", many)],
    timeoutMs: 1000,
    plan: [{ pass: "premium", query: "toro", wineType: "tinto", limit: 2 }]
  });

  const { products } = await aggregator.aggregate("46001");

  assert.deepEqual(products.map((product) => product.id), ["masymas-0", "masymas-1"]);
});

test("the request carries the postal code, limit and an abort signal", async () => {
  const seen: WineSourceRequest[] = [];
  const aggregator = new CatalogAggregator({
    sources: [
      source("mercadona", async (request) => {
        seen.push(request);
        return [];
      })
    ],
    timeoutMs: 1000,
    plan: singleQuery
  });

  await aggregator.aggregate("28013");

  assert.equal(seen.length, 1);
  assert.equal(seen[0]?.postalCode, "28013");
  assert.equal(seen[0]?.limit, 10);
  assert.equal(seen[0]?.wineType, "tinto");
  assert.ok(seen[0]?.signal instanceof AbortSignal);
});

// ── timeouts and total failure ─────────────────────────────────────────────

test("a store that never answers times out without blocking the others", async () => {
  let aborted = false;
  const hanging = source("dia", (request) =>
    new Promise<Product[]>((_resolve, reject) => {
      request.signal?.addEventListener("abort", () => {
        aborted = true;
        reject(new Error("aborted"));
      });
    })
  );
  const aggregator = new CatalogAggregator({
    sources: [staticSource("consum", [makeProduct("consum", "1")]), hanging],
    timeoutMs: 20,
    plan: singleQuery
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.deepEqual(products.map((product) => product.id), ["consum-1"]);
  assert.equal(report.stores.dia.timedOut, 1);
  assert.equal(report.stores.dia.failed, 0);
  assert.equal(aborted, true);
});

test("an ignored abort still resolves through the timeout", async () => {
  const aggregator = new CatalogAggregator({
    sources: [source("masymas", () => new Promise<Product[]>(() => undefined))],
    timeoutMs: 20,
    plan: singleQuery
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.deepEqual(products, []);
  assert.equal(report.stores.masymas.timedOut, 1);
});

test("all stores failing yields an empty catalog instead of a rejection", async () => {
  const aggregator = new CatalogAggregator({
    sources: [failingSource("consum"), failingSource("mercadona"), failingSource("masymas"), failingSource("dia")],
    timeoutMs: 1000,
    plan: singleQuery
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.deepEqual(products, []);
  assert.equal(report.total, 0);
  assert.equal(report.stores.consum.failed, 1);
  assert.equal(report.stores.dia.failed, 1);
});

test("unexpected errors count as failures", async () => {
  const aggregator = new CatalogAggregator({
    sources: [
      source("consum", async () => {
        throw new TypeError("boom");
      })
    ],
    timeoutMs: 1000,
    plan: singleQuery
  });

  const { report } = await aggregator.aggregate("46001");
  assert.equal(report.stores.consum.failed, 1);
});

test("matching native ids at different stores stay separate products", async () => {
  const aggregator = new CatalogAggregator({
    sources: [
      staticSource("consum", [makeProduct("consum", "c1", { price: 8, wineType: "tinto" })]),
      staticSource("mercadona", [makeProduct("mercadona", "m1", { price: 12, wineType: "blanco" })]),
      source("masymas", () => new Promise<Product[]>(() => undefined)),
      staticSource("dia", [makeProduct("dia", "c1", { price: 8, wineType: "tinto" })])
    ],
    timeoutMs: 20,
    plan: singleQuery
  });

  const { products, report } = await aggregator.aggregate("46001");

  assert.deepEqual(products.map((product) => product.id), ["consum-c1", "mercadona-m1", "dia-c1"]);
  assert.equal(report.duplicates, 0);
  assert.equal(report.stores.masymas.timedOut, 1);
});
