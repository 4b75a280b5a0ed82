/**
 * Route finding over a road map.
 *
 * States are places and so are actions: the action "Kumbakonam" means
 * "drive to Kumbakonam". Several problems may share one map; none of them
 * modifies it.
 */

import type { Coordinate, Place } from "@roadsearch/types";
import { MissingLinkError } from "../errors.js";
import { Problem, type ProblemConfig } from "./problem.js";
import type { RoadMap } from "./road-map.js";

export interface RouteProblemConfig extends ProblemConfig<Place> {
  map: RoadMap;
}

export class RouteProblem extends Problem<Place, Place> {
  readonly map: RoadMap;

  constructor(config: RouteProblemConfig) {
    super(config);
    this.map = config.map;
  }

  /** Places adjacent to `state`; none for a place the map does not know */
  actions(state: Place): readonly Place[] {
    return this.map.neighborsOf(state);
  }

  /** Moving to a non-adjacent place leaves the state unchanged */
  result(state: Place, action: Place): Place {
    return this.map.hasLink(state, action) ? action : state;
  }

  actionCost(state: Place, _action: Place, next: Place): number {
    const distance = this.map.distance(state, next);
    if (distance === undefined) {
      throw new MissingLinkError(state, next);
    }
    return distance;
  }

  locationOf(place: Place): Coordinate {
    return this.map.locationOf(place);
  }
}
