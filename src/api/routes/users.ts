// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyInstance } from 'fastify';
import {
  RegisterUserSchema,
  UpdateUserSchema,
  UserQuerySchema,
  type RegisterUserBody,
  type UpdateUserBody,
  type UserQuery,
} from '../schemas/user.schema.js';
import { IdParamsSchema, type IdParams } from '../schemas/common.schema.js';
import {
  validateBody,
  validateParams,
  validateQuery,
} from '../middlewares/validation.middleware.js';
import { createAuthMiddleware, currentIdentity } from '../middlewares/auth.middleware.js';
import type { SessionResolver } from '../../core/auth/SessionResolver.js';
import type { UserService } from '../../services/UserService.js';
import { toUserView } from '../views.js';

export async function userRoutes(
  fastify: FastifyInstance,
  opts: { userService: UserService; sessionResolver: SessionResolver },
): Promise<void> {
  const { userService, sessionResolver } = opts;
  const auth = createAuthMiddleware(sessionResolver);

  // POST /users
  fastify.post<{ Body: RegisterUserBody }>(
    '/users',
    { preHandler: [validateBody(RegisterUserSchema)] },
    async (request, reply) => {
      const user = await userService.register(request.body);
      return reply.status(201).send(toUserView(user));
    },
  );

  // GET /users, or a single user with ?email=
  fastify.get<{ Querystring: UserQuery }>(
    '/users',
    { preHandler: [auth, validateQuery(UserQuerySchema)] },
    async (request, reply) => {
      const { email } = request.query;
      if (email !== undefined) {
        return reply.send(toUserView(await userService.findByEmail(email)));
      }

      const users = await userService.listUsers();
      return reply.send(users.map(toUserView));
    },
  );

  // GET /users/:id
  fastify.get<{ Params: IdParams }>(
    '/users/:id',
    { preHandler: [auth, validateParams(IdParamsSchema)] },
    async (request, reply) => {
      const user = await userService.getUser(request.params.id);
      return reply.send(toUserView(user));
    },
  );

  // PUT /users/:id
  fastify.put<{ Params: IdParams; Body: UpdateUserBody }>(
    '/users/:id',
    { preHandler: [auth, validateParams(IdParamsSchema), validateBody(UpdateUserSchema)] },
    async (request, reply) => {
      const updated = await userService.updateUser(
        currentIdentity(request),
        request.params.id,
        request.body,
      );
      return reply.send(toUserView(updated));
    },
  );

  // DELETE /users/:id (soft deactivation)
  fastify.delete<{ Params: IdParams }>(
    '/users/:id',
    { preHandler: [auth, validateParams(IdParamsSchema)] },
    async (request, reply) => {
      await userService.deactivateUser(currentIdentity(request), request.params.id);
      return reply.status(204).send();
    },
  );
}
