export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public code: string,
    public status: number,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function validationError(message: string, fields?: string[]) {
  return new AppError("VALIDATION_ERROR", 400, message, fields ? { fields } : undefined);
}

export function errorBody(err: AppError | Error) {
  if (err instanceof AppError) {
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }
  return { error: { code: "INTERNAL_ERROR", message: "Unexpected error" } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Carries the HTTP status a webhook handler should answer with. Two HttpErrors are
 * equal when their codes and reason messages are, so a match survives wrapping.
 */
export class HttpError extends Error {
  constructor(
    public readonly code: number,
    public readonly reason?: Error
  ) {
    super(
      `internal ${code}: ${reason ? reason.message : "something happened, perhaps"}`,
      reason ? { cause: reason } : undefined
    );
    this.name = "HttpError";
  }

  matches(other: unknown): boolean {
    const found = findHttpError(other);
    if (!found) return false;
    return found.code === this.code && found.reason?.message === this.reason?.message;
  }
}

export function httpError(code: number, reason?: string | Error): HttpError {
  return new HttpError(code, typeof reason === "string" ? new Error(reason) : reason);
}

function* walkErrors(err: unknown, seen = new Set<unknown>()): Generator<unknown> {
  if (err === undefined || err === null || seen.has(err)) return;
  seen.add(err);
  yield err;
  if (err instanceof AggregateError) {
    for (const inner of err.errors) yield* walkErrors(inner, seen);
  }
  if (err instanceof Error && err.cause !== undefined) {
    yield* walkErrors(err.cause, seen);
  }
}

/** The first HttpError found in the cause chain or aggregated errors of err. */
export function findHttpError(err: unknown): HttpError | undefined {
  for (const candidate of walkErrors(err)) {
    if (candidate instanceof HttpError) return candidate;
  }
  return undefined;
}

/** Whether needle appears anywhere in the error tree rooted at haystack. */
export function containsError(haystack: unknown, needle: unknown): boolean {
  for (const candidate of walkErrors(haystack)) {
    if (candidate === needle) return true;
  }
  return false;
}

export function someError(err: unknown, predicate: (candidate: unknown) => boolean): boolean {
  for (const candidate of walkErrors(err)) {
    if (predicate(candidate)) return true;
  }
  return false;
}
