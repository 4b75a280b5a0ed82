import express, { type Router } from "express";
import { parseRouteSearchRequest, type RouteSearchService } from "../services/route-search.service.js";

export function createRouteController(service: RouteSearchService): Router {
  const router = express.Router();

  /** Breadth-first route between two places */
  router.post("/search", (req, res) => {
    const request = parseRouteSearchRequest(req.body);
    res.json(service.search(request));
  });

  return router;
}
