import type { Place } from "@roadsearch/types";

/** The search exhausted the map without reaching the goal */
export class RouteNotFoundError extends Error {
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = "RouteNotFoundError";
  }
}

/** A requested start or goal is not a place on the map */
export class UnknownPlaceError extends Error {
  readonly status = 404;
  readonly place: Place;

  constructor(place: Place, mapName: string) {
    super(`Unknown place "${place}" on map ${mapName}`);
    this.name = "UnknownPlaceError";
    this.place = place;
  }
}

/** A request body failed validation; `fields` maps each bad field to the problem */
export class RequestValidationError extends Error {
  readonly status = 422;
  readonly fields: Record<string, string>;

  constructor(fields: Record<string, string>) {
    super("Validation failed");
    this.name = "RequestValidationError";
    this.fields = fields;
  }
}
