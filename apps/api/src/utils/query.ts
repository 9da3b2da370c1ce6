import { z } from "zod";

/** Query-string flag: only the literals "true" and "false" are accepted. */
export const booleanQuerySchema = z.enum(["true", "false"]).transform((value) => value === "true");

export const searchQuerySchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));
