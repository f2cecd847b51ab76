// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

/**
 * Client-facing message catalogue. Every user-visible string the API returns
 * lives here so the service can be localised in one place.
 */
export const Messages = {
  INVALID_CREDENTIALS: 'Invalid email or password',
  ACCOUNT_INACTIVE: 'Account is inactive',
  MISSING_TOKEN: 'Authorization token is missing',
  INVALID_TOKEN: 'Authorization token is invalid',
  EXPIRED_TOKEN: 'Authorization token has expired',
  REVOKED_TOKEN: 'Authorization token has been revoked',
  TOKEN_ALREADY_REVOKED: 'Authorization token is already revoked',
  LOGOUT_SUCCESS: 'Logged out successfully',
  FORBIDDEN: 'Insufficient permissions',
  USER_NOT_FOUND: 'User not found',
  ROLE_NOT_FOUND: 'Role not found',
  EMAIL_TAKEN: 'A user with this email already exists',
  INVALID_EMAIL: 'Invalid email format',
  INVALID_NAME: 'Names may contain only Latin or Cyrillic letters and hyphens',
  WEAK_PASSWORD:
    'Password must be 8 to 100 characters long and contain an uppercase letter, a lowercase letter and a digit',
  VALIDATION_FAILED: 'Validation failed',
  INTERNAL_ERROR: 'Internal Server Error',
} as const;

export type MessageKey = keyof typeof Messages;
