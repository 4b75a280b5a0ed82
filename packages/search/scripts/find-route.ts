/**
 * Breadth-first route search between two places on a named map.
 * Usage: npx tsx scripts/find-route.ts <from> <to> [map]
 */
import { loadRoadMap, DEFAULT_MAP_NAME } from "../src/maps/index.js";
import { RouteProblem } from "../src/domain/index.js";
import { breadthFirstSearch } from "../src/search/index.js";
import { formatRouteSummary } from "../src/export/index.js";

async function main() {
  const [from, to, mapName = DEFAULT_MAP_NAME] = process.argv.slice(2);
  if (!from || !to) {
    console.error("Usage: find-route <from> <to> [map]");
    process.exit(1);
  }

  const map = loadRoadMap(mapName);
  for (const place of [from, to]) {
    if (!map.hasPlace(place)) {
      console.error(`Unknown place "${place}" on map ${mapName}`);
      process.exit(1);
    }
  }

  const problem = new RouteProblem({ initial: from, goal: to, map });
  const outcome = breadthFirstSearch(problem);

  for (const line of formatRouteSummary(outcome)) {
    console.log(line);
  }
  console.log("");
  console.log(
    `Expanded ${outcome.stats.nodesExpanded} nodes, generated ${outcome.stats.nodesGenerated}, peak frontier ${outcome.stats.peakFrontier}`,
  );
}

main().catch(e => { console.error(e); process.exit(1); });
