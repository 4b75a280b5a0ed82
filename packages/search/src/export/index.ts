/**
 * Presentation of search outcomes: plain-data summaries and printable lines.
 */

export * from "./route-summary.js";
