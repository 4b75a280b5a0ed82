/**
 * Route search service: request validation, breadth-first search, summary.
 */

import { breadthFirstSearch, RouteProblem, summarizeRoute } from "@roadsearch/search";
import type { ZodError } from "zod";
import { RouteSearchRequestSchema, type RouteSearchRequest } from "../models/requests.js";
import type { RouteSearchResponse } from "../models/responses.js";
import { RequestValidationError, RouteNotFoundError, UnknownPlaceError } from "../errors.js";
import { MapCatalogService } from "./map-catalog.service.js";

/** Field name (or `body`) to the first problem found with it */
function issueFields(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[field] ??= issue.message;
  }
  return fields;
}

/** Validate an incoming search body, collecting every bad field. */
export function parseRouteSearchRequest(body: unknown): RouteSearchRequest {
  const parsed = RouteSearchRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new RequestValidationError(issueFields(parsed.error));
  }
  return parsed.data;
}

export class RouteSearchService {
  private readonly catalog: MapCatalogService;
  private readonly defaultMap: string;

  constructor(catalog: MapCatalogService, defaultMap: string) {
    this.catalog = catalog;
    this.defaultMap = defaultMap;
  }

  /**
   * Search for a route between two places.
   * Throws UnknownPlaceError for places off the map and RouteNotFoundError
   * when the goal cannot be reached.
   */
  search(req: RouteSearchRequest): RouteSearchResponse {
    const mapName = req.map ?? this.defaultMap;
    const map = this.catalog.getMap(mapName);

    for (const place of [req.from, req.to]) {
      if (!map.hasPlace(place)) {
        throw new UnknownPlaceError(place, mapName);
      }
    }

    const start = performance.now();
    const outcome = breadthFirstSearch(new RouteProblem({ initial: req.from, goal: req.to, map }));
    const elapsed = performance.now() - start;
    const summary = summarizeRoute(outcome);

    console.log(
      `[route-search] ${mapName}: ${req.from} -> ${req.to}, ${summary.found ? `${summary.actions.length} links, distance ${summary.totalDistance}` : "no route"} (${outcome.stats.nodesExpanded} expanded, ${elapsed.toFixed(1)}ms)`,
    );

    if (!summary.found) {
      throw new RouteNotFoundError(`No route from "${req.from}" to "${req.to}" on map ${mapName}`);
    }

    return {
      map: mapName,
      ...summary,
      searchTimeMs: Math.round(elapsed * 100) / 100,
    };
  }
}
