/**
 * Error classes shared by the security core and the HTTP layer.
 * Every error carries the status and machine code the error handler renders.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// 401 family - the caller is not (or no longer) authenticated
export class AuthenticationError extends AppError {
  constructor(message: string, code: string) {
    super(message, 401, code);
  }
}

/**
 * Login failure. The message is the same for an unknown username and a wrong
 * password.
 */
export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid username or password', 'INVALID_CREDENTIALS');
  }
}

export class MissingCredentialsError extends AuthenticationError {
  constructor() {
    super('Missing bearer token', 'MISSING_CREDENTIALS');
  }
}

export class ExpiredTokenError extends AuthenticationError {
  constructor() {
    super('Token expired', 'TOKEN_EXPIRED');
  }
}

export class MalformedTokenError extends AuthenticationError {
  constructor(message: string = 'Invalid token') {
    super(message, 'TOKEN_MALFORMED');
  }
}

export class UnknownAlgorithmError extends AuthenticationError {
  constructor(public readonly algorithm: string | undefined) {
    super('Unexpected token algorithm', 'TOKEN_ALGORITHM');
  }
}

// 403 family - authenticated, but not allowed
export class AuthorizationError extends AppError {
  constructor(message: string, code: string) {
    super(message, 403, code);
  }
}

export class InsufficientPermissionError extends AuthorizationError {
  constructor(public readonly requiredRole: string) {
    super('Insufficient role permissions', 'INSUFFICIENT_PERMISSION');
  }
}

/**
 * The password hashing primitive itself failed. Server fault, never a client
 * error.
 */
export class HashingError extends AppError {
  constructor(public readonly originalError?: unknown) {
    super('Password hashing failed', 500, 'HASHING_ERROR');
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier ? `${resource} '${identifier}' not found` : `${resource} not found`,
      404,
      'NOT_FOUND'
    );
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 500, 'CONFIGURATION_ERROR');
  }
}
