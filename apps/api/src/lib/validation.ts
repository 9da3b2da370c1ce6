import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "./errors.js";

export function parseInput<TOutput, TInput>(schema: ZodType<TOutput, ZodTypeDef, TInput>, input: unknown, message: string) {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}
