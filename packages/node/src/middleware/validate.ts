/**
 * Zod request validation.
 *
 * Parses the JSON body, query string or a path parameter against a
 * schema and returns the typed result. Failures throw ApiError
 * VALIDATION_ERROR, which the error handler renders as 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ApiError } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate the JSON request body. An empty body is read as `{}`.
 */
export async function readBody<T>(c: Context, schema: Schema<T>): Promise<T> {
  const text = await c.req.text();

  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      throw new ApiError("VALIDATION_ERROR", "Invalid JSON in request body");
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function readQuery<T>(c: Context, schema: Schema<T>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Invalid query parameters", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function readParam<T>(c: Context, name: string, schema: Schema<T>): T {
  const result = schema.safeParse(c.req.param(name));
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", `Invalid path parameter "${name}"`, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
