/**
 * Named road maps stored as JSON under `configs/maps/`.
 */

export * from "./map-config.js";
export * from "./map-schema.js";
