// Error taxonomy shared by services and routes. The route layer turns these into HTTP responses.

import type { ErrorKind } from "@replyledger/shared";

export class TrackerError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly statusCode: number;

  constructor(kind: ErrorKind, code: string, message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends TrackerError {
  constructor(code: string, message: string) {
    super("validation", code, message, 400);
  }
}

export class NotFoundError extends TrackerError {
  constructor(code: string, message: string) {
    super("validation", code, message, 404);
  }
}

export class ConflictError extends TrackerError {
  constructor(code: string, message: string) {
    super("validation", code, message, 409);
  }
}

export class ExternalError extends TrackerError {
  constructor(code: string, message: string, cause?: unknown) {
    super("external", code, message, 502, { cause });
  }
}

export class PersistenceError extends TrackerError {
  constructor(message: string, cause?: unknown) {
    super("persistence", "persistence_failed", message, 503, { cause });
  }
}

export class ConsistencyError extends TrackerError {
  constructor(code: string, message: string) {
    super("consistency", code, message, 403);
  }
}

// Anything that is not already classified is a failed write/read against the store.
export function asPersistenceError(e: unknown, message: string): TrackerError {
  if (e instanceof TrackerError) return e;
  return new PersistenceError(message, e);
}
