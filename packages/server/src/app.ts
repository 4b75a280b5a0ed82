import express from "express";
import cors from "cors";
import { DEFAULT_MAP_NAME } from "@roadsearch/search";
import { createHealthController } from "./controllers/health.controller.js";
import { createMapController } from "./controllers/map.controller.js";
import { createRouteController } from "./controllers/route.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { MapCatalogService } from "./services/map-catalog.service.js";
import { RouteSearchService } from "./services/route-search.service.js";

export interface AppOptions {
  catalog?: MapCatalogService;
  defaultMap?: string;
}

export function createApp(options: AppOptions = {}): express.Express {
  const catalog = options.catalog ?? new MapCatalogService();
  const routeSearch = new RouteSearchService(catalog, options.defaultMap ?? DEFAULT_MAP_NAME);

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use("/health", createHealthController(catalog));
  app.use("/api/maps", createMapController(catalog));
  app.use("/api/routes", createRouteController(routeSearch));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
