// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { eq, lt } from 'drizzle-orm';
import { revokedTokens } from '../schema/revokedTokens.js';
import type { Database } from '../client.js';
import type { RevocationRecord } from '../../types/auth.types.js';
import type { RevokedTokenRepository } from './types.js';

export class DrizzleRevokedTokenRepository implements RevokedTokenRepository {
  constructor(private readonly db: Database) {}

  async insert(record: RevocationRecord): Promise<boolean> {
    // The unique jti index decides between concurrent writers
    const rows = await this.db
      .insert(revokedTokens)
      .values({
        jti: record.tokenId,
        userId: record.subjectId,
        revokedAt: record.revokedAt,
        expiresAt: record.expiresAt,
      })
      .onConflictDoNothing({ target: revokedTokens.jti })
      .returning({ id: revokedTokens.id });

    return rows.length > 0;
  }

  async exists(tokenId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: revokedTokens.id })
      .from(revokedTokens)
      .where(eq(revokedTokens.jti, tokenId))
      .limit(1);

    return rows.length > 0;
  }

  async deleteExpiredBefore(cutoff: Date): Promise<number> {
    const rows = await this.db
      .delete(revokedTokens)
      .where(lt(revokedTokens.expiresAt, cutoff))
      .returning({ id: revokedTokens.id });

    return rows.length;
  }
}
