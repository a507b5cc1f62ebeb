export type SessionErrorCode =
  | "INVALID_IDENTITY"
  | "DEPLOY_FAILED"
  | "RESOLVE_FAILED"
  | "UNIQUE_CONSTRAINT"
  | "NOT_FOUND";

export type ErrorStatusCode = 400 | 404 | 409 | 502;

export class SessionServiceError extends Error {
  readonly code: SessionErrorCode;
  readonly statusCode: ErrorStatusCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: SessionErrorCode,
    statusCode: ErrorStatusCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "SessionServiceError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details;
  }
}

/** Raised before anything leaves the process; the value never reaches helm or kubectl. */
export class InvalidIdentityError extends SessionServiceError {
  constructor(label: string, expected = "a lowercase canonical UUID") {
    super("INVALID_IDENTITY", 400, `Invalid ${label}: expected ${expected}`);
    this.name = "InvalidIdentityError";
  }
}

export class DeployError extends SessionServiceError {
  readonly output: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;

  constructor(
    operation: string,
    params: { output: string; exitCode: number | null; timedOut?: boolean; cause?: unknown },
  ) {
    const timedOut = params.timedOut ?? false;
    const reason = timedOut ? "timed out" : `exited with code ${params.exitCode ?? "unknown"}`;
    const output = params.output.trim();
    super("DEPLOY_FAILED", 502, `${operation} ${reason}${output ? `: ${output}` : ""}`, {
      details: { operation, exitCode: params.exitCode, timedOut },
      cause: params.cause,
    });
    this.name = "DeployError";
    this.output = output;
    this.exitCode = params.exitCode;
    this.timedOut = timedOut;
  }
}

export class ResolveError extends SessionServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("RESOLVE_FAILED", 502, message, { details });
    this.name = "ResolveError";
  }
}

export class UniqueConstraintError extends SessionServiceError {
  readonly projectIdentity: string;

  constructor(projectIdentity: string, cause?: unknown) {
    super("UNIQUE_CONSTRAINT", 409, "An active session already exists for this project", {
      details: { projectIdentity },
      cause,
    });
    this.name = "UniqueConstraintError";
    this.projectIdentity = projectIdentity;
  }
}

export class NotFoundError extends SessionServiceError {
  constructor(message = "Session not found") {
    super("NOT_FOUND", 404, message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
