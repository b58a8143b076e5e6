import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/error.js";
import { createRefreshRateLimiter } from "../../middleware/rateLimit.js";
import type { CatalogCache } from "../../services/catalogCache.js";
import { MAX_SEARCH_LIMIT, searchWines } from "../../services/wineSearch.js";
import { storeDirectory } from "../../services/wineSources/registry.js";
import { STORE_IDS, WINE_TYPES, type WineSearchResponse } from "../../types/contracts.js";

const postalCodeSchema = z.string().trim().regex(/^\d{5}$/, "postalCode must be a 5-digit Spanish postal code");

const searchQuerySchema = z
  .object({
    q: z.string().trim().max(120).optional(),
    wineType: z.union([z.enum(WINE_TYPES), z.literal("unknown")]).optional(),
    region: z.string().trim().max(60).optional(),
    store: z.enum(STORE_IDS).optional(),
    minPrice: z.coerce.number().min(0).optional(),
    maxPrice: z.coerce.number().min(0).optional(),
    postalCode: postalCodeSchema.optional(),
    limit: z.coerce.number().int().min(1).max(MAX_SEARCH_LIMIT).optional(),
  })
  .refine(
    (query) => query.minPrice === undefined || query.maxPrice === undefined || query.minPrice <= query.maxPrice,
    { message: "minPrice must not exceed maxPrice", path: ["minPrice"] }
  );

const refreshBodySchema = z
  .object({
    postalCode: postalCodeSchema.optional(),
  })
  .default({});

export function createWinesRouter(catalog: CatalogCache): Router {
  const router = Router();

  router.get(
    "/wines/search",
    asyncHandler(async (req, res) => {
      const params = searchQuerySchema.parse(req.query);
      const snapshot = await catalog.read(params.postalCode);
      const { total, wines } = searchWines(snapshot.products, {
        query: params.q,
        wineType: params.wineType,
        region: params.region,
        store: params.store,
        minPrice: params.minPrice,
        maxPrice: params.maxPrice,
        limit: params.limit,
      });

      const response: WineSearchResponse = {
        total,
        wines,
        dataSource: snapshot.dataSource,
        lastRefreshed: snapshot.lastRefreshed === null ? null : new Date(snapshot.lastRefreshed).toISOString(),
      };
      res.json(response);
    })
  );

  router.get("/stores", (_req, res) => {
    res.json({ stores: STORE_IDS.map((id) => storeDirectory[id]) });
  });

  router.get("/catalog/stats", (_req, res) => {
    res.json({ ...catalog.stats(), lastRun: catalog.lastReport() });
  });

  router.post(
    "/catalog/refresh",
    createRefreshRateLimiter(),
    asyncHandler(async (req, res) => {
      const body = refreshBodySchema.parse(req.body ?? {});
      await catalog.forceRefresh(body.postalCode);
      res.json({ ...catalog.stats(), lastRun: catalog.lastReport() });
    })
  );

  return router;
}
