// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { Messages } from './messages.js';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AuthError extends AppError {
  constructor(message = 'Authentication failed', code = 'AUTH_ERROR') {
    super(message, 401, code);
  }
}

// Credential failures

export class InvalidCredentialsError extends AuthError {
  constructor() {
    super(Messages.INVALID_CREDENTIALS, 'INVALID_CREDENTIALS');
  }
}

export class AccountInactiveError extends AuthError {
  constructor() {
    super(Messages.ACCOUNT_INACTIVE, 'ACCOUNT_INACTIVE');
  }
}

/**
 * Failures of a presented bearer token. Responses carry a
 * `WWW-Authenticate: Bearer` challenge.
 */
export class SessionError extends AuthError {}

export class MissingTokenError extends SessionError {
  constructor() {
    super(Messages.MISSING_TOKEN, 'MISSING_TOKEN');
  }
}

export class InvalidTokenError extends SessionError {
  constructor() {
    super(Messages.INVALID_TOKEN, 'TOKEN_INVALID');
  }
}

export class ExpiredTokenError extends SessionError {
  constructor() {
    super(Messages.EXPIRED_TOKEN, 'TOKEN_EXPIRED');
  }
}

export class RevokedTokenError extends SessionError {
  constructor() {
    super(Messages.REVOKED_TOKEN, 'TOKEN_REVOKED');
  }
}

export class TokenAlreadyRevokedError extends SessionError {
  constructor() {
    super(Messages.TOKEN_ALREADY_REVOKED, 'TOKEN_ALREADY_REVOKED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = Messages.FORBIDDEN, code = 'FORBIDDEN') {
    super(message, 403, code);
  }
}

export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string = Messages.VALIDATION_FAILED, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
