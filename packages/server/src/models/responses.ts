import type { MapInfo, RouteSummary, WeightedLink } from "@roadsearch/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  maps: CatalogStats;
}

export interface CatalogStats {
  /** Maps loaded and held in memory */
  cached: number;
}

export interface MapListResponse {
  maps: MapInfo[];
}

export interface MapDetailResponse extends MapInfo {
  directed: boolean;
  places: string[];
  /** One-way links, mirrored ones included */
  links: WeightedLink[];
}

export interface RouteSearchResponse extends RouteSummary {
  map: string;
  searchTimeMs: number;
}

export interface ErrorBody {
  message: string;
  details?: Record<string, string>;
}
