/**
 * Zod request validation.
 *
 * Parses the request body, query string or a path parameter against a
 * Zod schema. Failures throw RequestValidationError, which the global
 * error handler answers with 400 VALIDATION_ERROR.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError } from "../types/error.js";
import type { ValidationIssue } from "../types/error.js";

/** Any schema producing `T`, whatever input it accepts. */
type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate the JSON request body.
 */
export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: Schema<T>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(
      "Request body validation failed",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

/**
 * Validate the query string.
 */
export function parseQuery<T>(c: Context<AppEnv>, schema: Schema<T>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError(
      "Invalid query parameters",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

/**
 * Validate a single path parameter.
 */
export function parseParam<T>(
  name: string,
  value: string | undefined,
  schema: Schema<T>,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(
      `Invalid path parameter "${name}"`,
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
