/**
 * Lineage Error Hierarchy
 *
 * All errors extend LineageError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * Every error here is a contract violation detected synchronously. Nothing
 * is retried.
 *
 * @example
 * ```typescript
 * try {
 *   catalog.register("Shapes", Circle);
 * } catch (error) {
 *   if (isLineageError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by incorrect usage. Recoverable by fixing the call.
 * - `constraint`: The supplied data breaks a structural rule (e.g. a cycle).
 * - `system`: Internal invariant broken. Indicates a bug.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for LineageError constructor.
 */
export type LineageErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

/**
 * Renders a descriptor for messages. Class constructors render by name.
 */
export function describeEntity(entity: unknown): string {
  if (typeof entity === "function") {
    return entity.name === "" ? "(anonymous class)" : entity.name;
  }
  if (typeof entity === "symbol") {
    return entity.toString();
  }
  if (typeof entity === "string") {
    return entity;
  }
  return formatCause(entity);
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all Lineage errors.
 */
export class LineageError extends Error {
  /** Machine-readable error code (e.g., "UNKNOWN_CATALOG") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: LineageErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "LineageError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Type Set Errors (category: "user")
// ============================================================

/**
 * Thrown when an operation that requires a type set receives something else.
 */
export class InvalidTypeSetError extends LineageError {
  constructor(operation: string, received: unknown) {
    const receivedType = received === null ? "null" : typeof received;
    super(
      `${operation} expects a type set (array), got ${receivedType}`,
      "INVALID_TYPE_SET",
      {
        details: { operation, receivedType },
        category: "user",
        suggestion: `Build type sets with typeSet(...) or pass a plain array of descriptors.`,
      },
    );
    this.name = "InvalidTypeSetError";
  }
}

/**
 * Thrown on positional access beyond the bounds of a type set.
 *
 * @example
 * ```typescript
 * front(emptyTypeSet); // throws OutOfRangeError
 * ```
 */
export class OutOfRangeError extends LineageError {
  constructor(
    details: Readonly<{ operation: string; index: number; size: number }>,
  ) {
    super(
      details.size === 0 ?
        `${details.operation} on an empty type set`
      : `${details.operation}: index ${details.index} is out of range for a type set of size ${details.size}`,
      "OUT_OF_RANGE",
      {
        details,
        category: "user",
        suggestion:
          details.size === 0 ?
            `Check size(set) > 0 before reading from it.`
          : `Use an integer index between 0 and ${details.size - 1}.`,
      },
    );
    this.name = "OutOfRangeError";
  }
}

/**
 * Thrown when a selection is asked to pick from an empty candidate set.
 */
export class EmptySelectionError extends LineageError {
  constructor(operation: string) {
    super(`${operation} requires at least one candidate`, "EMPTY_SELECTION", {
      details: { operation },
      category: "user",
      suggestion: `Guard the call with size(candidates) > 0.`,
    });
    this.name = "EmptySelectionError";
  }
}

// ============================================================
// Catalog Errors (category: "user")
// ============================================================

/**
 * Thrown when a catalog name is used before it has been declared.
 */
export class UnknownCatalogError extends LineageError {
  constructor(name: string, operation: string) {
    super(`Catalog not declared: "${name}"`, "UNKNOWN_CATALOG", {
      details: { name, operation },
      category: "user",
      suggestion: `Call declare("${name}") before ${operation}.`,
    });
    this.name = "UnknownCatalogError";
  }
}

/**
 * Thrown when a catalog name is declared a second time.
 */
export class DuplicateDeclarationError extends LineageError {
  constructor(name: string, declaredAt: number) {
    super(
      `Catalog "${name}" is already declared (at sequence ${declaredAt})`,
      "DUPLICATE_DECLARATION",
      {
        details: { name, declaredAt },
        category: "user",
        suggestion: `Declare each catalog once, or use has("${name}") to check first.`,
      },
    );
    this.name = "DuplicateDeclarationError";
  }
}

// ============================================================
// Hierarchy Errors (category: "constraint")
// ============================================================

/**
 * Thrown when inheritance declarations form a cycle.
 */
export class HierarchyCycleError extends LineageError {
  constructor(entities: readonly string[]) {
    super(
      `Inheritance declarations form a cycle through: ${entities.join(", ")}`,
      "HIERARCHY_CYCLE",
      {
        details: { entities },
        category: "constraint",
        suggestion: `Remove one of the inherits(...) declarations between these entities.`,
      },
    );
    this.name = "HierarchyCycleError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when options or names fail validation.
 */
export class ConfigurationError extends LineageError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the options passed in. See error.details for the failing fields.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for LineageError.
 */
export function isLineageError(error: unknown): error is LineageError {
  return error instanceof LineageError;
}

/**
 * Check if error is recoverable by fixing the call or its data.
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isLineageError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isLineageError(error) ? error.suggestion : undefined;
}
