// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { createErrorHandler } from './middlewares/errorHandler.middleware.js';
import { healthRoutes, type ReadinessCheck } from './routes/health.js';
import { authRoutes } from './routes/auth.js';
import { userRoutes } from './routes/users.js';
import { roleRoutes } from './routes/roles.js';
import type { Authenticator } from '../core/auth/Authenticator.js';
import type { SessionResolver } from '../core/auth/SessionResolver.js';
import type { UserService } from '../services/UserService.js';
import type { RoleDirectory } from '../services/RoleDirectory.js';
import type { Logger } from '../utils/logger.js';

export interface ServerDependencies {
  authenticator: Authenticator;
  sessionResolver: SessionResolver;
  userService: UserService;
  roleDirectory: RoleDirectory;
  readinessChecks: Record<string, ReadinessCheck>;
  logger: Logger;
}

export interface ServerConfig {
  isDev: boolean;
  corsOrigins: string[];
}

export const API_PREFIX = '/api/v1';

export async function createServer(
  config: ServerConfig,
  deps: ServerDependencies,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'requestId',
    bodyLimit: 1048576,
    trustProxy: true,
  });

  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
  });

  // CORS
  await fastify.register(cors, {
    origin: (origin, cb) => {
      const allowed = [
        ...config.corsOrigins,
        ...(config.isDev ? ['http://localhost:3000'] : []),
      ];
      if (!origin || allowed.includes(origin)) {
        cb(null, true);
      } else {
        cb(new Error('Not allowed by CORS'), false);
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    maxAge: 86400,
  });

  fastify.addHook('onResponse', async (request, reply) => {
    deps.logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        duration: Math.round(reply.elapsedTime),
        requestId: request.id,
        userId: request.identity?.id,
      },
      'Request completed',
    );
  });

  // Error handler
  fastify.setErrorHandler(createErrorHandler(deps.logger, config.isDev));

  // Routes
  await fastify.register(healthRoutes, {
    prefix: '',
    checks: deps.readinessChecks,
    logger: deps.logger,
  });
  await fastify.register(authRoutes, {
    prefix: API_PREFIX,
    authenticator: deps.authenticator,
    sessionResolver: deps.sessionResolver,
  });
  await fastify.register(userRoutes, {
    prefix: API_PREFIX,
    userService: deps.userService,
    sessionResolver: deps.sessionResolver,
  });
  await fastify.register(roleRoutes, {
    prefix: API_PREFIX,
    roleDirectory: deps.roleDirectory,
    sessionResolver: deps.sessionResolver,
  });

  return fastify;
}
