// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { RevokedTokenRepository } from '../../db/repositories/types.js';
import { TokenAlreadyRevokedError } from '../../utils/errors.js';
import type { Clock } from '../../types/auth.types.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Token ids invalidated before their natural expiry. Rows only matter until
 * the token would have expired anyway, after which pruning may drop them.
 */
export class RevocationLedger {
  constructor(
    private readonly store: RevokedTokenRepository,
    private readonly logger: Logger,
    private readonly now: Clock = () => new Date(),
  ) {}

  /**
   * Records a revocation. Concurrent revocations of the same token id are
   * settled by the store's unique index; the loser gets TokenAlreadyRevokedError.
   */
  async revoke(tokenId: string, subjectId: number, expiresAt: Date): Promise<void> {
    const inserted = await this.store.insert({
      tokenId,
      subjectId,
      revokedAt: this.now(),
      expiresAt,
    });

    if (!inserted) {
      this.logger.warn({ tokenId, subjectId }, 'Token already revoked');
      throw new TokenAlreadyRevokedError();
    }

    this.logger.info({ tokenId, subjectId }, 'Token revoked');
  }

  isRevoked(tokenId: string): Promise<boolean> {
    return this.store.exists(tokenId);
  }

  /** Deletes records whose original expiry lies strictly in the past. */
  async pruneExpired(): Promise<number> {
    const removed = await this.store.deleteExpiredBefore(this.now());
    if (removed > 0) {
      this.logger.info({ removed }, 'Pruned expired revocation records');
    }
    return removed;
  }
}
