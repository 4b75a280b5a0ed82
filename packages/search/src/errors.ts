import type { Place } from "@roadsearch/types";

/** A problem method that a concrete domain must provide was invoked on the base class */
export class NotImplementedError extends Error {
  constructor(method: string) {
    super(`Not implemented: ${method}`);
    this.name = "NotImplementedError";
  }
}

/** A cost was requested for a pair of places with no link between them */
export class MissingLinkError extends Error {
  readonly from: Place;
  readonly to: Place;

  constructor(from: Place, to: Place) {
    super(`No link from "${from}" to "${to}"`);
    this.name = "MissingLinkError";
    this.from = from;
    this.to = to;
  }
}

/** Link data or a map file does not describe a valid road map */
export class InvalidMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMapError";
  }
}

/** No map file exists under the requested name */
export class MapNotFoundError extends Error {
  readonly mapName: string;

  constructor(mapName: string) {
    super(`Map not found: ${mapName}`);
    this.name = "MapNotFoundError";
    this.mapName = mapName;
  }
}
