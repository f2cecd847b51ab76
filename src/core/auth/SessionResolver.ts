// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { UserRepository } from '../../db/repositories/types.js';
import {
  AccountInactiveError,
  MissingTokenError,
  RevokedTokenError,
} from '../../utils/errors.js';
import type { Identity } from '../../types/user.types.js';
import type { ResolvedSession, SessionClaims } from '../../types/auth.types.js';
import type { Logger } from '../../utils/logger.js';
import type { TokenCodec } from './TokenCodec.js';
import type { RevocationLedger } from './RevocationLedger.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization) return undefined;
  return BEARER_PATTERN.exec(authorization)?.[1];
}

/**
 * Turns a presented token into a verified identity.
 *
 * The identity is always reloaded from the credential store. The `active`
 * claim is only a snapshot from login time, and a deactivation or role
 * change has to take effect before the token expires.
 */
export class SessionResolver {
  constructor(
    private readonly codec: TokenCodec,
    private readonly ledger: RevocationLedger,
    private readonly users: UserRepository,
    private readonly logger: Logger,
  ) {}

  /**
   * Checks presence, signature, expiry and revocation, in that order.
   * Does not touch the credential store.
   */
  async validateToken(token: string | undefined): Promise<SessionClaims> {
    if (!token) {
      throw new MissingTokenError();
    }

    const claims = this.codec.decode(token);

    if (await this.ledger.isRevoked(claims.tokenId)) {
      this.logger.debug({ tokenId: claims.tokenId }, 'Rejected revoked token');
      throw new RevokedTokenError();
    }

    return claims;
  }

  async resolveSession(token: string | undefined): Promise<ResolvedSession> {
    const claims = await this.validateToken(token);

    const identity = await this.users.findById(claims.subjectId);
    if (!identity?.isActive) {
      this.logger.info(
        { userId: claims.subjectId, found: identity !== null },
        'Rejected token for inactive or missing account',
      );
      throw new AccountInactiveError();
    }

    return { identity, claims };
  }

  async resolve(token: string | undefined): Promise<Identity> {
    const { identity } = await this.resolveSession(token);
    return identity;
  }
}
