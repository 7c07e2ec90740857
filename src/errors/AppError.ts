/**
 * Errors that cross the service boundary. The error middleware maps each one
 * to its HTTP status; anything that is not an AppError becomes a generic 500.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

/** The profile exists but lacks the village or state needed to locate the farm. */
export class ProfileIncompleteError extends NotFoundError {
  constructor(farmerId: string) {
    super(`Farmer profile ${farmerId} is missing village or state information`, 'PROFILE_INCOMPLETE');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Not authorized to access this farmer') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = 'Unable to fetch location data. Please try again later.') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
  }
}

/** The caller went away before the response was ready; nothing is written back. */
export class RequestAbortedError extends AppError {
  constructor() {
    super('Request aborted by client', 499, 'REQUEST_ABORTED');
  }
}
