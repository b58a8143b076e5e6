import test from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import { z } from "zod";
import { createApp } from "../src/app.js";
import { CatalogCache, type CatalogLoader } from "../src/services/catalogCache.js";
import { makeProduct, makeResult } from "./fixtures/products.js";

// ── helpers ────────────────────────────────────────────────────────────────

const catalogProducts = [
  makeProduct("consum", "1", { name: "Rioja Crianza", wineType: "tinto", region: "Rioja", price: 8 }),
  makeProduct("dia", "2", { name: "Albariño Martín Códax", wineType: "blanco", price: 9 }),
  makeProduct("mercadona", "3", { name: "Vino tinto Reserva", wineType: "tinto", price: 12 })
];

const defaultLoader: CatalogLoader = async (postalCode) => makeResult(catalogProducts, postalCode);

function createCatalog(load: CatalogLoader = defaultLoader): CatalogCache {
  return new CatalogCache({ load, ttlMs: 60_000, retryAfterMs: 60_000, defaultPostalCode: "46001" });
}

async function withServer<T>(catalog: CatalogCache, run: (baseURL: string) => Promise<T>): Promise<T> {
  const app = createApp(catalog);

  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, "127.0.0.1", () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${address.port}`;
  try {
    return await run(baseURL);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

const searchPayload = z.object({
  total: z.number(),
  wines: z.array(z.object({ id: z.string(), price: z.number() })),
  dataSource: z.enum(["live", "stale", "empty"]),
  lastRefreshed: z.string().nullable()
});

const errorPayload = z.object({
  error: z.string(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional()
});

const statsPayload = z.object({
  state: z.string(),
  size: z.number(),
  refreshCount: z.number(),
  postalCode: z.string().nullable(),
  lastRun: z.object({ postalCode: z.string(), total: z.number() }).nullable()
});

// ── search ─────────────────────────────────────────────────────────────────

test("GET /api/v1/wines/search filters and sorts the catalog", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/wines/search?wineType=tinto&maxPrice=10`);

    assert.equal(response.status, 200);
    const payload = searchPayload.parse(await response.json());
    assert.equal(payload.total, 1);
    assert.deepEqual(payload.wines.map((wine) => wine.id), ["consum-1"]);
    assert.equal(payload.dataSource, "live");
    assert.equal(typeof payload.lastRefreshed, "string");
  });
});

test("GET /api/v1/wines/search orders by price and honours the limit", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/wines/search?limit=2`);

    const payload = searchPayload.parse(await response.json());
    assert.equal(payload.total, 3);
    assert.deepEqual(payload.wines.map((wine) => wine.price), [8, 9]);
  });
});

test("GET /api/v1/wines/search rejects invalid parameters", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const badStore = await fetch(`${baseURL}/api/v1/wines/search?store=lidl`);
    assert.equal(badStore.status, 400);
    assert.equal(errorPayload.parse(await badStore.json()).error, "validation_error");

    const badRange = await fetch(`${baseURL}/api/v1/wines/search?minPrice=10&maxPrice=5`);
    assert.equal(badRange.status, 400);
    const payload = errorPayload.parse(await badRange.json());
    assert.deepEqual(payload.details, [{ path: "minPrice", message: "minPrice must not exceed maxPrice" }]);

    const badLimit = await fetch(`${baseURL}/api/v1/wines/search?limit=0`);
    assert.equal(badLimit.status, 400);
  });
});

test("GET /api/v1/wines/search answers with an empty page when every store fails", async () => {
  const catalog = createCatalog(async (postalCode) => makeResult([], postalCode));
  await withServer(catalog, async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/wines/search`);

    assert.equal(response.status, 200);
    const payload = searchPayload.parse(await response.json());
    assert.equal(payload.total, 0);
    assert.equal(payload.dataSource, "empty");
    assert.equal(payload.lastRefreshed, null);
  });
});

// ── stores and catalog ─────────────────────────────────────────────────────

test("GET /api/v1/stores lists the stores in merge order", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/stores`);

    assert.equal(response.status, 200);
    const payload = z.object({ stores: z.array(z.object({ id: z.string() })) }).parse(await response.json());
    assert.deepEqual(payload.stores.map((store) => store.id), ["consum", "mercadona", "masymas", "dia"]);
  });
});

test("POST /api/v1/catalog/refresh reloads for the given postal code", async () => {
  const postalCodes: string[] = [];
  const catalog = createCatalog(async (postalCode) => {
    postalCodes.push(postalCode);
    return makeResult(catalogProducts, postalCode);
  });

  await withServer(catalog, async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/catalog/refresh`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ postalCode: "28013" })
    });

    assert.equal(response.status, 200);
    const payload = statsPayload.parse(await response.json());
    assert.equal(payload.state, "fresh");
    assert.equal(payload.size, 3);
    assert.equal(payload.refreshCount, 1);
    assert.equal(payload.postalCode, "28013");
    assert.deepEqual(payload.lastRun, { postalCode: "28013", total: 3 });
    assert.deepEqual(postalCodes, ["28013"]);
  });
});

test("POST /api/v1/catalog/refresh validates the postal code", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/catalog/refresh`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ postalCode: "46" })
    });

    assert.equal(response.status, 400);
    assert.equal(errorPayload.parse(await response.json()).error, "validation_error");
  });
});

test("GET /api/v1/catalog/stats reports an untouched catalog as empty", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/catalog/stats`);

    const payload = statsPayload.parse(await response.json());
    assert.equal(payload.state, "empty");
    assert.equal(payload.size, 0);
    assert.equal(payload.lastRun, null);
  });
});

// ── health ─────────────────────────────────────────────────────────────────

test("GET /health/ready turns ready once the catalog has loaded", async () => {
  const catalog = createCatalog();
  await withServer(catalog, async (baseURL) => {
    const cold = await fetch(`${baseURL}/health/ready`);
    assert.equal(cold.status, 503);

    await catalog.forceRefresh();

    const warm = await fetch(`${baseURL}/health/ready`);
    assert.equal(warm.status, 200);
    const payload = z.object({ ready: z.boolean(), catalogState: z.string() }).parse(await warm.json());
    assert.deepEqual(payload, { ready: true, catalogState: "fresh" });
  });
});

test("unknown routes return not_found", async () => {
  await withServer(createCatalog(), async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/wines/unknown`);

    assert.equal(response.status, 404);
    assert.equal(errorPayload.parse(await response.json()).error, "not_found");
  });
});
