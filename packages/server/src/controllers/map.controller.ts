import express, { type Router } from "express";
import type { MapListResponse } from "../models/responses.js";
import type { MapCatalogService } from "../services/map-catalog.service.js";

export function createMapController(catalog: MapCatalogService): Router {
  const router = express.Router();

  /** List available maps */
  router.get("/", (_req, res) => {
    const body: MapListResponse = { maps: catalog.list() };
    res.json(body);
  });

  /** Places and links of one map */
  router.get("/:name", (req, res) => {
    res.json(catalog.describe(req.params.name));
  });

  return router;
}
