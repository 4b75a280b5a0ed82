import express, { type Router } from "express";
import type { HealthResponse } from "../models/responses.js";
import type { MapCatalogService } from "../services/map-catalog.service.js";

export function createHealthController(catalog: MapCatalogService): Router {
  const router = express.Router();

  /** Health check with catalog statistics */
  router.get("/", (_req, res) => {
    const body: HealthResponse = {
      status: "ok",
      uptime: process.uptime(),
      maps: catalog.getStats(),
    };
    res.json(body);
  });

  return router;
}
