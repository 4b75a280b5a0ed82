import { createApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { MapCatalogService } from "./services/map-catalog.service.js";

const config = loadServerConfig();

const app = createApp({
  catalog: new MapCatalogService(config.mapsDir),
  defaultMap: config.defaultMap,
});

app.listen(config.port, () => {
  console.log(`\nRoadsearch API server running at http://localhost:${config.port}`);
  console.log(`Default map: ${config.defaultMap}\n`);
});
