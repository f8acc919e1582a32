export type FaceAttendanceErrorKind =
  | "DimensionMismatch"
  | "PersistenceFailure"
  | "ValidationError"
  | "InvalidInput";

export abstract class FaceAttendanceError extends Error {
  abstract readonly kind: FaceAttendanceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DimensionMismatchError extends FaceAttendanceError {
  readonly kind = "DimensionMismatch" as const;

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
  }
}

export class PersistenceError extends FaceAttendanceError {
  readonly kind = "PersistenceFailure" as const;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${reason}`, { cause });
  }
}

export class ValidationError extends FaceAttendanceError {
  readonly kind = "ValidationError" as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class InvalidInputError extends FaceAttendanceError {
  readonly kind = "InvalidInput" as const;
}

export interface ErrorResult {
  status: "error";
  kind: FaceAttendanceErrorKind;
  message: string;
}

/**
 * Convert a domain failure into a result value. Anything that is not a
 * FaceAttendanceError is a bug and is rethrown.
 */
export const toErrorResult = (error: unknown): ErrorResult => {
  if (error instanceof FaceAttendanceError) {
    return { status: "error", kind: error.kind, message: error.message };
  }
  throw error;
};

/** Run a repository call, wrapping any failure in a PersistenceError. */
export const withPersistence = async <T>(operation: string, task: () => Promise<T>): Promise<T> => {
  try {
    return await task();
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError(operation, error);
  }
};
