/**
 * Weighted road map between named places.
 *
 * Built from a list of declared links. Unless the map is directed, every
 * link is mirrored with the same distance, so `distance(a, b)` and
 * `distance(b, a)` agree and each end appears among the other's
 * neighbors. Neighbor lists keep the order in which links were declared,
 * with mirrored links following the declared ones; that order is the
 * order in which a search tries moves.
 */

import type { Coordinate, LinkSpec, Place, WeightedLink } from "@roadsearch/types";
import { InvalidMapError } from "../errors.js";

/** Distance given to links declared without one */
export const DEFAULT_LINK_DISTANCE = 1;

const ORIGIN: Coordinate = { x: 0, y: 0 };

export interface RoadMapOptions {
  /** Coordinates per place; places without one sit at the origin */
  locations?: Record<Place, Coordinate>;
  /** Keep links one-way instead of mirroring them (default false) */
  directed?: boolean;
}

function normalizeLink(link: LinkSpec): WeightedLink {
  if ("from" in link) return { from: link.from, to: link.to, distance: link.distance };
  if (link.length === 3) return { from: link[0], to: link[1], distance: link[2] };
  return { from: link[0], to: link[1], distance: DEFAULT_LINK_DISTANCE };
}

function validateLink(link: WeightedLink, index: number): void {
  if (typeof link.from !== "string" || link.from.length === 0) {
    throw new InvalidMapError(`Link ${index}: "from" must be a non-empty place name`);
  }
  if (typeof link.to !== "string" || link.to.length === 0) {
    throw new InvalidMapError(`Link ${index}: "to" must be a non-empty place name`);
  }
  if (typeof link.distance !== "number" || !Number.isFinite(link.distance) || link.distance <= 0) {
    throw new InvalidMapError(
      `Link ${index} (${link.from} -> ${link.to}): distance must be a positive number, got ${String(link.distance)}`,
    );
  }
}

export class RoadMap {
  readonly directed: boolean;
  /** from -> (to -> distance); inner insertion order is neighbor order */
  private readonly distances = new Map<Place, Map<Place, number>>();
  private readonly neighbors = new Map<Place, readonly Place[]>();
  private readonly locations = new Map<Place, Coordinate>();
  /** Every place named by a link or a location, in first-seen order */
  private readonly placeSet = new Set<Place>();

  constructor(links: Iterable<LinkSpec>, options: RoadMapOptions = {}) {
    this.directed = options.directed ?? false;

    const declared: WeightedLink[] = [];
    for (const spec of links) {
      const link = normalizeLink(spec);
      validateLink(link, declared.length);
      declared.push(link);
      this.setDistance(link.from, link.to, link.distance);
    }

    if (!this.directed) {
      // Mirrors go in the order their links were declared, each with the
      // weight its pair holds when it is reached.
      for (const { from, to } of declared) {
        const distance = this.distances.get(from)?.get(to);
        if (distance !== undefined) this.setDistance(to, from, distance);
      }
    }

    for (const [from, targets] of this.distances) {
      this.neighbors.set(from, Object.freeze([...targets.keys()]));
    }

    const locations = options.locations;
    if (locations) {
      for (const [place, coordinate] of Object.entries(locations)) {
        this.locations.set(place, { x: coordinate.x, y: coordinate.y });
        this.placeSet.add(place);
      }
    }
  }

  private setDistance(from: Place, to: Place, distance: number): void {
    let targets = this.distances.get(from);
    if (!targets) {
      targets = new Map();
      this.distances.set(from, targets);
    }
    targets.set(to, distance);
    this.placeSet.add(from);
    this.placeSet.add(to);
  }

  /** All places on the map, in the order they were first mentioned */
  places(): Place[] {
    return [...this.placeSet];
  }

  hasPlace(place: Place): boolean {
    return this.placeSet.has(place);
  }

  /** Places one link away from `place`, in declaration order; `[]` if unknown */
  neighborsOf(place: Place): readonly Place[] {
    return this.neighbors.get(place) ?? [];
  }

  /** Distance of the link from `from` to `to`, or undefined if there is none */
  distance(from: Place, to: Place): number | undefined {
    return this.distances.get(from)?.get(to);
  }

  hasLink(from: Place, to: Place): boolean {
    return this.distances.get(from)?.has(to) ?? false;
  }

  /** Number of one-way links, mirrored ones included */
  get linkCount(): number {
    let count = 0;
    for (const targets of this.distances.values()) count += targets.size;
    return count;
  }

  /** Every one-way link, grouped by origin in neighbor order */
  links(): WeightedLink[] {
    const out: WeightedLink[] = [];
    for (const [from, targets] of this.distances) {
      for (const [to, distance] of targets) out.push({ from, to, distance });
    }
    return out;
  }

  /** Coordinate of `place`, or the origin when none was given */
  locationOf(place: Place): Coordinate {
    const location = this.locations.get(place) ?? ORIGIN;
    return { x: location.x, y: location.y };
  }
}
