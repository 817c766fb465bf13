/**
 * Application Errors
 *
 * Every failure the pipeline can route on has its own class; the Fastify
 * error handler renders any AppError as { ok: false, error: code, message }.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or malformed session / query input. Never retried. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/** A second run was started for a session that is still executing. */
export class SessionBusyError extends AppError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is already being processed`, 'SESSION_BUSY', 409);
  }
}

export class InsufficientDataError extends AppError {
  constructor(
    public readonly mode: string,
    public readonly usableRows: number,
    public readonly requiredRows: number,
  ) {
    super(
      `Not enough data for ${mode} prediction: ${usableRows} usable rows, ${requiredRows} required`,
      'INSUFFICIENT_DATA',
      422,
    );
  }
}

/** Predictor or scaler missing / unreadable. Fatal for the session. */
export class ArtifactLoadError extends AppError {
  constructor(message: string) {
    super(message, 'ARTIFACT_LOAD_ERROR', 503);
  }
}

export class ProviderError extends AppError {
  constructor(message: string) {
    super(message, 'PROVIDER_ERROR', 502);
  }
}

export class TransientPublishError extends AppError {
  constructor(message: string) {
    super(message, 'TRANSIENT_PUBLISH_ERROR', 502);
  }
}

export class PersistentPublishError extends AppError {
  constructor(
    message: string,
    public readonly httpStatus?: number,
  ) {
    super(message, 'PERSISTENT_PUBLISH_ERROR', 502);
  }
}

/** Language model unavailable, timed out or returned nothing usable. */
export class CapabilityError extends AppError {
  constructor(message: string) {
    super(message, 'CAPABILITY_ERROR', 503);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

export class UnexpectedError extends AppError {
  constructor(
    message: string,
    public readonly original?: unknown,
  ) {
    super(message, 'UNEXPECTED_ERROR', 500);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  return new UnexpectedError(describeError(err), err);
}
