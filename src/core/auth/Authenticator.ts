// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { UserRepository } from '../../db/repositories/types.js';
import {
  AccountInactiveError,
  InvalidCredentialsError,
  RevokedTokenError,
  TokenAlreadyRevokedError,
  ValidationError,
} from '../../utils/errors.js';
import { Messages } from '../../utils/messages.js';
import { isValidEmail } from '../../utils/validators.js';
import type { IssuedToken, SessionClaims } from '../../types/auth.types.js';
import type { Logger } from '../../utils/logger.js';
import type { PasswordHasher } from './PasswordHasher.js';
import type { TokenCodec } from './TokenCodec.js';
import type { RevocationLedger } from './RevocationLedger.js';
import type { SessionResolver } from './SessionResolver.js';

const MAX_PASSWORD_LENGTH = 1024;

export interface AuthenticatorOptions {
  /** Report inactive accounts with the generic invalid-credentials error. */
  unifyInactiveError: boolean;
}

export class Authenticator {
  constructor(
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
    private readonly codec: TokenCodec,
    private readonly resolver: SessionResolver,
    private readonly ledger: RevocationLedger,
    private readonly logger: Logger,
    private readonly options: AuthenticatorOptions = { unifyInactiveError: false },
  ) {}

  /**
   * Verifies an email/password pair and mints a session token. Nothing is
   * written on success.
   *
   * An unknown email and a wrong password produce the same error. The
   * inactive check runs only once the password has matched.
   */
  async authenticate(email: string, password: string): Promise<IssuedToken> {
    if (!isValidEmail(email)) {
      throw new ValidationError(Messages.INVALID_EMAIL);
    }

    // No stored password can be this long, and argon2 work grows with input size
    if (password.length > MAX_PASSWORD_LENGTH) {
      this.logger.info('Login rejected: oversized password');
      throw new InvalidCredentialsError();
    }

    const user = await this.users.findCredentialByEmail(email.trim());

    if (!user) {
      await this.hasher.verifyAgainstDummy(password);
      this.logger.info('Login rejected: unknown email');
      throw new InvalidCredentialsError();
    }

    const passwordMatches = await this.hasher.verify(user.passwordHash, password);
    if (!passwordMatches) {
      this.logger.info({ userId: user.id }, 'Login rejected: wrong password');
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      this.logger.info({ userId: user.id }, 'Login rejected: account inactive');
      throw this.options.unifyInactiveError
        ? new InvalidCredentialsError()
        : new AccountInactiveError();
    }

    const claims = this.codec.buildClaims(user);
    const token = this.codec.issue(claims);

    this.logger.info({ userId: user.id, tokenId: claims.tokenId }, 'User logged in');

    return {
      token,
      tokenType: 'bearer',
      expiresIn: this.codec.ttlSeconds,
      claims,
    };
  }

  /**
   * Revokes the presented token. A token that is already revoked fails with
   * TokenAlreadyRevokedError, whether the earlier logout is visible to the
   * revocation check or only surfaces as a lost insert race. A token whose
   * user no longer exists fails with AccountInactiveError.
   */
  async logout(token: string | undefined): Promise<void> {
    let claims: SessionClaims;
    try {
      claims = await this.resolver.validateToken(token);
    } catch (error) {
      if (error instanceof RevokedTokenError) {
        throw new TokenAlreadyRevokedError();
      }
      throw error;
    }

    // Revocations reference the user row. Deactivated accounts may still log out.
    const identity = await this.users.findById(claims.subjectId);
    if (!identity) {
      this.logger.info({ userId: claims.subjectId }, 'Logout rejected: account missing');
      throw new AccountInactiveError();
    }

    await this.ledger.revoke(claims.tokenId, claims.subjectId, new Date(claims.expiresAt * 1000));
    this.logger.info({ userId: claims.subjectId }, 'User logged out');
  }
}
