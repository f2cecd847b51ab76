// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  extractBearerToken,
  type SessionResolver,
} from '../../core/auth/SessionResolver.js';
import { MissingTokenError } from '../../utils/errors.js';
import type { Identity } from '../../types/user.types.js';
import type { SessionClaims } from '../../types/auth.types.js';

declare module 'fastify' {
  interface FastifyRequest {
    identity?: Identity;
    sessionClaims?: SessionClaims;
  }
}

export function createAuthMiddleware(resolver: SessionResolver) {
  return async function authMiddleware(
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> {
    const token = extractBearerToken(request.headers.authorization);
    const { identity, claims } = await resolver.resolveSession(token);
    request.identity = identity;
    request.sessionClaims = claims;
  };
}

export function currentIdentity(request: FastifyRequest): Identity {
  if (!request.identity) {
    throw new MissingTokenError();
  }
  return request.identity;
}
