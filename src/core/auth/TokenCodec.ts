// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { ExpiredTokenError, InvalidTokenError } from '../../utils/errors.js';
import type { Clock, SessionClaims } from '../../types/auth.types.js';

export interface TokenCodecConfig {
  secret: string;
  ttlSeconds: number;
  issuer: string;
  audience: string;
}

const ALGORITHM = 'HS256';

const ClaimsPayloadSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/),
  active: z.boolean(),
  iat: z.number().int().nonnegative(),
  exp: z.number().int().positive(),
  jti: z.string().uuid(),
});

/**
 * Signs and verifies session tokens. Pure computation: no I/O and no state
 * beyond the configuration it was built with.
 */
export class TokenCodec {
  constructor(
    private readonly config: TokenCodecConfig,
    private readonly now: Clock = () => new Date(),
  ) {}

  get ttlSeconds(): number {
    return this.config.ttlSeconds;
  }

  buildClaims(subject: { id: number; isActive: boolean }): SessionClaims {
    const issuedAt = toEpochSeconds(this.now());
    return {
      subjectId: subject.id,
      active: subject.isActive,
      issuedAt,
      expiresAt: issuedAt + this.config.ttlSeconds,
      tokenId: randomUUID(),
    };
  }

  issue(claims: SessionClaims): string {
    return jwt.sign(
      {
        sub: String(claims.subjectId),
        active: claims.active,
        iat: claims.issuedAt,
        exp: claims.expiresAt,
        jti: claims.tokenId,
      },
      this.config.secret,
      {
        algorithm: ALGORITHM,
        issuer: this.config.issuer,
        audience: this.config.audience,
      },
    );
  }

  /**
   * @throws ExpiredTokenError when the signature is valid but `exp` has passed
   * @throws InvalidTokenError for anything else that fails verification
   */
  decode(token: string): SessionClaims {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secret, {
        algorithms: [ALGORITHM],
        issuer: this.config.issuer,
        audience: this.config.audience,
        clockTimestamp: toEpochSeconds(this.now()),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new ExpiredTokenError();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new InvalidTokenError();
      }
      throw error;
    }

    const parsed = ClaimsPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidTokenError();
    }

    return {
      subjectId: Number(parsed.data.sub),
      active: parsed.data.active,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
      tokenId: parsed.data.jti,
    };
  }
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
