/** HTTP-facing error; the error handler turns it into the response envelope */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export const errors = {
  badRequest: (message: string, code = "BAD_REQUEST") => new ApiError(400, code, message),
  unauthorized: (message = "Unauthorized") => new ApiError(401, "UNAUTHORIZED", message),
  forbidden: (message = "Forbidden") => new ApiError(403, "FORBIDDEN", message),
  notFound: (resource: string) => new ApiError(404, "NOT_FOUND", `${resource} not found`),
  conflict: (message: string) => new ApiError(409, "CONFLICT", message),
  internal: (message = "Internal server error") => new ApiError(500, "INTERNAL_ERROR", message),
};

export type OperationErrorKind = "validation" | "not_found" | "backend";

/** Failure of a single WebSocket operation; reported to the sender, never fatal */
export class OperationError extends Error {
  constructor(
    public readonly kind: OperationErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "OperationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
