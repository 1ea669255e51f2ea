import type { z } from "zod";
import { ValidationError } from "../errors.js";

/** Parse `input` with `schema`, throwing a ValidationError naming the first bad field. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}
