import { z } from "zod";

const placeField = () =>
  z.string({ required_error: "is required", invalid_type_error: "must be a string" }).min(1, "must not be empty");

export const RouteSearchRequestSchema = z.object(
  {
    /** Starting place */
    from: placeField(),
    /** Goal place */
    to: placeField(),
    /** Map to search (defaults to the server's configured map) */
    map: z
      .string({ invalid_type_error: "must be a string" })
      .min(1, "must not be empty")
      .optional(),
  },
  { required_error: "must be a JSON object", invalid_type_error: "must be a JSON object" },
);

export type RouteSearchRequest = z.infer<typeof RouteSearchRequestSchema>;
