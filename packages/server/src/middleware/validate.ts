/**
 * Zod validation middleware.
 *
 * Thin wrappers over hono/validator: the parsed value is available to
 * the handler through `c.req.valid(target)`. A failed parse throws the
 * ZodError, which the error handler turns into a 400 envelope.
 * Malformed JSON bodies surface as Hono's HTTPException(400).
 */

import { validator } from "hono/validator";
import type { z } from "zod";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Validate the JSON request body. */
export function jsonBody<T>(schema: Schema<T>) {
  return validator("json", (value): T => schema.parse(value));
}

/** Validate the query string. */
export function queryOf<T>(schema: Schema<T>) {
  return validator("query", (value): T => schema.parse(value));
}

/** Validate path parameters. */
export function paramsOf<T>(schema: Schema<T>) {
  return validator("param", (value): T => schema.parse(value));
}
