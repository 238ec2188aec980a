/**
 * Store errors
 */

/** PostgreSQL SQLSTATE for unique_violation */
export const UNIQUE_VIOLATION = "23505";

/**
 * Raised by the store when an insert hits an existing primary key.
 */
export class DuplicateLinkError extends Error {
  readonly id: string;

  constructor(id: string, options?: { cause?: unknown }) {
    super(`Link with ID "${id}" already exists`, options);
    this.name = "DuplicateLinkError";
    this.id = id;
  }
}

/**
 * Check whether an error is a PostgreSQL unique constraint violation
 */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION;
}
