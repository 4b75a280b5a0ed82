/**
 * JSON config system for road maps.
 *
 * Each map lives in `configs/maps/<name>.json` as a list of
 * `[from, to, distance]` links plus optional place coordinates. Files are
 * validated on load; a map that fails validation is never built.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { MapFile, MapInfo } from "@roadsearch/types";
import { InvalidMapError, MapNotFoundError } from "../errors.js";
import { RoadMap } from "../domain/road-map.js";
import { formatIssues, MapFileSchema } from "./map-schema.js";

/** Map used when a caller does not name one */
export const DEFAULT_MAP_NAME = "thanjavur-nagapattinam";

const MAP_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/maps/`.
 * Works from both source (packages/search/src/) and compiled (dist/) paths.
 */
export function findMapsDir(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "maps");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/search/src/maps
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "maps");
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Check the shape of parsed map JSON. `source` names the file in error messages. */
export function parseMapFile(value: unknown, source: string): MapFile {
  const parsed = MapFileSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidMapError(`${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Read and validate `configs/maps/<name>.json`. */
export function loadMapFile(name: string, mapsDir: string = findMapsDir()): MapFile {
  if (!MAP_NAME_PATTERN.test(name)) {
    throw new MapNotFoundError(name);
  }
  const filePath = join(mapsDir, `${name}.json`);
  if (!existsSync(filePath)) {
    throw new MapNotFoundError(name);
  }

  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidMapError(`${name}.json: ${message}`);
  }
  return parseMapFile(parsed, `${name}.json`);
}

/** Build a road map from a validated map file. */
export function buildRoadMap(mapFile: MapFile): RoadMap {
  return new RoadMap(mapFile.links, {
    directed: mapFile.directed ?? false,
    locations: mapFile.locations,
  });
}

/** Load a named map file and build its road map. */
export function loadRoadMap(name: string, mapsDir: string = findMapsDir()): RoadMap {
  const mapFile = loadMapFile(name, mapsDir);
  const map = buildRoadMap(mapFile);
  console.log(
    `[maps] Loaded ${name}: ${map.places().length} places, ${mapFile.links.length} links${map.directed ? " (directed)" : ""}`,
  );
  return map;
}

/** List all available maps. Files that fail validation are skipped. */
export function listMaps(mapsDir: string = findMapsDir()): MapInfo[] {
  if (!existsSync(mapsDir)) return [];

  const files = readdirSync(mapsDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  const maps: MapInfo[] = [];

  for (const file of files) {
    const name = file.slice(0, -".json".length);
    try {
      const mapFile = loadMapFile(name, mapsDir);
      maps.push({ name, description: mapFile.description });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[maps] Skipping ${file}: ${message}`);
    }
  }

  return maps;
}
