/**
 * Zod validation wrappers that turn schema failures into ConfigurationError
 * with the failing fields listed in `details.issues`.
 */

import { z, type ZodError, type ZodType } from "zod";

import { ConfigurationError } from "./index";

// ============================================================
// Types
// ============================================================

/**
 * Validation issue converted from Zod.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "order") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code?: string;
}>;

// ============================================================
// Schemas
// ============================================================

/**
 * Catalog names: non-empty, no surrounding whitespace.
 */
export const catalogNameSchema = z
  .string()
  .min(1, "Catalog name must not be empty")
  .refine((name) => name.trim() === name, {
    message: "Catalog name must not start or end with whitespace",
  });

/**
 * Points in the registration history.
 */
export const sequenceSchema = z.number().int();

/**
 * How the resolver breaks ties between incomparable candidates.
 */
export const resolveOrderSchema = z.enum(["fold", "declaration"]);

// ============================================================
// Validation Functions
// ============================================================

function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates a value against a schema.
 *
 * @throws ConfigurationError listing every issue if validation fails
 */
export function validateConfig<T>(
  schema: ZodType<T>,
  value: unknown,
  subject: string,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const summary = issues
    .map((issue) =>
      issue.path === "" ? issue.message : `${issue.path}: ${issue.message}`,
    )
    .join("; ");

  throw new ConfigurationError(
    `Invalid ${subject}: ${summary}`,
    { subject, issues },
    { cause: result.error },
  );
}

/**
 * Validates a catalog name and returns it unchanged.
 */
export function validateCatalogName(name: unknown): string {
  return validateConfig(catalogNameSchema, name, "catalog name");
}
