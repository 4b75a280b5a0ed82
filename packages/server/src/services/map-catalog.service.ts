/**
 * Map catalog. Loads named road maps on first use and keeps them in memory.
 *
 * Road maps are read-only once built, so one instance serves every search
 * against that map.
 */

import type { MapInfo } from "@roadsearch/types";
import { findMapsDir, listMaps, loadMapFile, loadRoadMap, type RoadMap } from "@roadsearch/search";
import type { CatalogStats, MapDetailResponse } from "../models/responses.js";

export class MapCatalogService {
  private readonly mapsDir: string;
  private readonly maps = new Map<string, RoadMap>();

  constructor(mapsDir: string = findMapsDir()) {
    this.mapsDir = mapsDir;
  }

  /** Road map for `name`, loading it on first request. */
  getMap(name: string): RoadMap {
    let map = this.maps.get(name);
    if (!map) {
      map = loadRoadMap(name, this.mapsDir);
      this.maps.set(name, map);
    }
    return map;
  }

  list(): MapInfo[] {
    return listMaps(this.mapsDir);
  }

  describe(name: string): MapDetailResponse {
    const mapFile = loadMapFile(name, this.mapsDir);
    const map = this.getMap(name);
    return {
      name: mapFile.name,
      description: mapFile.description,
      directed: map.directed,
      places: map.places(),
      links: map.links(),
    };
  }

  getStats(): CatalogStats {
    return { cached: this.maps.size };
  }
}
