// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyInstance } from 'fastify';
import { IdParamsSchema, type IdParams } from '../schemas/common.schema.js';
import { validateParams } from '../middlewares/validation.middleware.js';
import { createAuthMiddleware } from '../middlewares/auth.middleware.js';
import type { SessionResolver } from '../../core/auth/SessionResolver.js';
import type { RoleDirectory } from '../../services/RoleDirectory.js';
import { toRoleView } from '../views.js';

export async function roleRoutes(
  fastify: FastifyInstance,
  opts: { roleDirectory: RoleDirectory; sessionResolver: SessionResolver },
): Promise<void> {
  const { roleDirectory, sessionResolver } = opts;
  const auth = createAuthMiddleware(sessionResolver);

  // GET /roles
  fastify.get('/roles', { preHandler: [auth] }, async (_request, reply) => {
    const roles = await roleDirectory.listRoles();
    return reply.send(roles.map(toRoleView));
  });

  // GET /roles/:id
  fastify.get<{ Params: IdParams }>(
    '/roles/:id',
    { preHandler: [auth, validateParams(IdParamsSchema)] },
    async (request, reply) => {
      const role = await roleDirectory.getRole(request.params.id);
      return reply.send(toRoleView(role));
    },
  );
}
