// =============================================================================
// Attendwell API: Typed failures
// Domain code throws these; plugins/error-handler.ts maps them to responses.
// =============================================================================

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing, invalid or expired credential; deactivated account at login. */
export class UnauthenticatedError extends AppError {
  constructor(message = 'Could not validate credentials', code = 'UNAUTHENTICATED') {
    super(401, code, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(403, 'FORBIDDEN', message);
  }
}

/** Also used when tenancy filtering hides the row; callers cannot tell the two apart. */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}
