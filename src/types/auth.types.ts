// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { Identity } from './user.types.js';

/**
 * Claims carried by a session token. Timestamps are whole seconds since the
 * Unix epoch, as they appear on the wire.
 */
export interface SessionClaims {
  subjectId: number;
  active: boolean;
  issuedAt: number;
  expiresAt: number;
  tokenId: string;
}

export interface IssuedToken {
  token: string;
  tokenType: 'bearer';
  expiresIn: number;
  claims: SessionClaims;
}

export interface ResolvedSession {
  identity: Identity;
  claims: SessionClaims;
}

export interface RevocationRecord {
  tokenId: string;
  subjectId: number;
  revokedAt: Date;
  expiresAt: Date;
}

export type Clock = () => Date;
