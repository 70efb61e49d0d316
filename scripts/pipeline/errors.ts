/**
 * Error kinds surfaced by the poll core.
 *
 * ValidationError and NotFoundError never leave partial writes behind.
 * PersistenceError wraps a storage failure and keeps it as `cause`.
 */

export type PollErrorCode = "VALIDATION" | "NOT_FOUND" | "PERSISTENCE";

export abstract class PollError extends Error {
  abstract readonly code: PollErrorCode;
}

export class ValidationError extends PollError {
  readonly code = "VALIDATION";
  readonly name = "ValidationError";
}

export class NotFoundError extends PollError {
  readonly code = "NOT_FOUND";
  readonly name = "NotFoundError";

  constructor(readonly id: string) {
    super(`Candidate not found: ${id}`);
  }
}

export class PersistenceError extends PollError {
  readonly code = "PERSISTENCE";
  readonly name = "PersistenceError";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
