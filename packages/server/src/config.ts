import { DEFAULT_MAP_NAME, findMapsDir } from "@roadsearch/search";

export interface ServerConfig {
  port: number;
  /** Map searched when a request names none */
  defaultMap: string;
  /** Directory holding `<name>.json` map files */
  mapsDir: string;
}

/**
 * Read server settings from the environment:
 * PORT, ROADSEARCH_MAP and ROADSEARCH_MAPS_DIR.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env["PORT"] ?? "3000", 10);
  return {
    port: Number.isNaN(port) ? 3000 : port,
    defaultMap: env["ROADSEARCH_MAP"] ?? DEFAULT_MAP_NAME,
    mapsDir: env["ROADSEARCH_MAPS_DIR"] ?? findMapsDir(),
  };
}
