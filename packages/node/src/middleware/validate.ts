/**
 * Zod request validation.
 *
 * Route handlers read their input through these helpers; a failure throws
 * `RequestValidationError`, which the error handler turns into a 400.
 */

import type { Context } from "hono";
import type { z } from "zod";

export class RequestValidationError extends Error {
  readonly code = "VALIDATION_ERROR";
  readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.details = issues.length > 0 ? { issues } : {};
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Parse and validate the JSON request body.
 *
 * An empty body is passed to the schema as `undefined`.
 *
 * @throws {RequestValidationError}
 */
export async function validateBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
): Promise<z.output<S>> {
  const text = await c.req.text();
  let body: unknown;
  try {
    body = text.trim() === "" ? undefined : JSON.parse(text);
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }
  return check(schema, body, "Request body validation failed");
}

/**
 * Validate the query string.
 *
 * @throws {RequestValidationError}
 */
export function validateQuery<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
): z.output<S> {
  return check(schema, c.req.query(), "Query validation failed");
}

export function formatZodErrors(error: z.ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function check<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}
