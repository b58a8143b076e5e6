import { Router } from "express";
import type { CatalogCache } from "../../services/catalogCache.js";
import { createWinesRouter } from "./wines.js";

export function createV1Router(catalog: CatalogCache): Router {
  const router = Router();

  router.use("/", createWinesRouter(catalog));

  return router;
}
