import { z } from "zod";

const NON_EMPTY = "must be a non-empty string";

const PlaceNameSchema = z
  .string({ required_error: "must be a place name", invalid_type_error: "must be a place name" })
  .min(1, "must be a non-empty place name");

export const WeightedTripleSchema = z.tuple(
  [PlaceNameSchema, PlaceNameSchema, z.number({ invalid_type_error: "distance must be a number" })],
  { errorMap: () => ({ message: "must be a [from, to, distance] triple" }) },
);

export const CoordinateSchema = z.object(
  {
    x: z.number({ required_error: "must be a number", invalid_type_error: "must be a number" }),
    y: z.number({ required_error: "must be a number", invalid_type_error: "must be a number" }),
  },
  { invalid_type_error: "must be { x, y }" },
);

export const MapFileSchema = z.object(
  {
    name: z.string({ required_error: NON_EMPTY, invalid_type_error: NON_EMPTY }).min(1, NON_EMPTY),
    description: z.string({ required_error: "must be a string", invalid_type_error: "must be a string" }),
    directed: z.boolean({ invalid_type_error: "must be a boolean" }).optional(),
    links: z.array(WeightedTripleSchema, {
      required_error: "must be an array",
      invalid_type_error: "must be an array",
    }),
    locations: z.record(CoordinateSchema, { invalid_type_error: "must be an object" }).optional(),
  },
  { required_error: "expected a JSON object", invalid_type_error: "expected a JSON object" },
);

export type ValidatedMapFile = z.infer<typeof MapFileSchema>;

/** `links[0]`, `locations.A`: where in the file an issue sits */
export function issuePath(path: readonly (string | number)[]): string {
  return path
    .map((segment, i) => (typeof segment === "number" ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join("");
}

/** One line per issue, prefixed with its location in the file */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issuePath(issue.path)}: ${issue.message}` : issue.message))
    .join("; ");
}
