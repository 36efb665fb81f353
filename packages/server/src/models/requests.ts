import { z } from "zod";
import { ValidationError } from "../middleware/error-handler.js";

/** Query-string number; blank values are rejected rather than read as 0 */
const queryNumber = <T extends z.ZodTypeAny>(number: T) =>
  z.string().trim().min(1, "Required").pipe(number);

const longitude = queryNumber(z.coerce.number().min(-180).max(180));
const latitude = queryNumber(z.coerce.number().min(-90).max(90));

export const routeQuerySchema = z.object({
  start_lon: longitude,
  start_lat: latitude,
  end_lon: longitude,
  end_lat: latitude,
});
export type RouteQuery = z.infer<typeof routeQuerySchema>;

export const searchQuerySchema = z.object({
  term: z.string(),
  /** `full=true` returns location records for an exact name instead of autocomplete names */
  full: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});
export type SearchQuery = z.infer<typeof searchQuerySchema>;

export const rasterQuerySchema = z.object({
  ullon: queryNumber(z.coerce.number()),
  ullat: queryNumber(z.coerce.number()),
  lrlon: queryNumber(z.coerce.number()),
  lrlat: queryNumber(z.coerce.number()),
  w: queryNumber(z.coerce.number().positive()),
  h: queryNumber(z.coerce.number().positive()),
});
export type RasterQuery = z.infer<typeof rasterQuerySchema>;

export const parseDirectionsBodySchema = z.object({
  lines: z.array(z.string()).min(1),
});
export type ParseDirectionsBody = z.infer<typeof parseDirectionsBodySchema>;

/**
 * Validate untrusted input against a schema.
 *
 * @throws ValidationError with the zod issues
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new ValidationError(result.error.issues);
  return result.data;
}
