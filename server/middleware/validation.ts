import type { Request } from "express";
import { z, ZodError } from "zod";
import { isCalendarDate } from "@shared/lib/dates";
import { isValidMoney, parseMoney } from "@shared/lib/money";
import { ValidationError } from "../lib/errors";

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

export function formatZodError(error: ZodError): FieldError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, formatZodError(result.error));
  }
  return result.data;
}

/**
 * Validate the request body against a Zod schema
 * @throws ValidationError with one entry per failing field
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request): T {
  return parseWith(schema, req.body, "Validation failed");
}

export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request): T {
  return parseWith(schema, req.query, "Query validation failed");
}

export function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request): T {
  return parseWith(schema, req.params, "Parameter validation failed");
}

// Shared field schemas

export const calendarDateField = z.string().trim().refine(isCalendarDate, "must be a date in YYYY-MM-DD format");

/** Accepts "12.50" or 12.5; yields cents. */
export const moneyField = z.union([z.string(), z.number()])
  .refine(isValidMoney, "must be a non-negative amount with at most two decimals")
  .transform((value) => parseMoney(value));

export const idParam = z.object({
  id: z.coerce.number().int().positive(),
});

export const pageQuery = (defaultPerPage: number) => z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(defaultPerPage),
});
