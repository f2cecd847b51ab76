// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type {
  FastifyBodyParser,
  FastifyInstance,
  FastifyRequest,
} from 'fastify';
import { LoginSchema, type LoginInput } from '../schemas/auth.schema.js';
import { validateBody } from '../middlewares/validation.middleware.js';
import { createAuthMiddleware, currentIdentity } from '../middlewares/auth.middleware.js';
import { extractBearerToken, type SessionResolver } from '../../core/auth/SessionResolver.js';
import type { Authenticator } from '../../core/auth/Authenticator.js';
import { Messages } from '../../utils/messages.js';
import { toUserView } from '../views.js';

export async function authRoutes(
  fastify: FastifyInstance,
  opts: { authenticator: Authenticator; sessionResolver: SessionResolver },
): Promise<void> {
  const { authenticator, sessionResolver } = opts;

  // Scoped to this plugin: an empty JSON body reads as no body, so logout
  // reaches token validation
  const parseJson = fastify.getDefaultJsonParser('error', 'error');
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser(
    'application/json',
    { parseAs: 'string' },
    (request: FastifyRequest, body: string, done: NonNullable<Parameters<FastifyBodyParser<string>>[2]>) => {
      if (body.length === 0) {
        done(null, undefined);
        return;
      }
      parseJson(request, body, done);
    },
  );

  // POST /auth/login
  fastify.post<{ Body: LoginInput }>(
    '/auth/login',
    { preHandler: [validateBody(LoginSchema)] },
    async (request, reply) => {
      const { email, password } = request.body;
      const issued = await authenticator.authenticate(email, password);

      return reply.send({
        accessToken: issued.token,
        tokenType: issued.tokenType,
        expiresIn: issued.expiresIn,
      });
    },
  );

  // POST /auth/logout
  fastify.post('/auth/logout', async (request, reply) => {
    await authenticator.logout(extractBearerToken(request.headers.authorization));
    return reply.send({ message: Messages.LOGOUT_SUCCESS });
  });

  // GET /auth/me
  fastify.get(
    '/auth/me',
    { preHandler: [createAuthMiddleware(sessionResolver)] },
    async (request, reply) => {
      return reply.send(toUserView(currentIdentity(request)));
    },
  );
}
