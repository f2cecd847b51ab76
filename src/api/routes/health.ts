// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../utils/logger.js';

export type ReadinessCheck = () => Promise<unknown>;

export async function healthRoutes(
  fastify: FastifyInstance,
  opts: { checks: Record<string, ReadinessCheck>; logger: Logger },
): Promise<void> {
  fastify.get('/health', async (_request, reply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  fastify.get('/health/ready', async (_request, reply) => {
    const checks: Record<string, string> = {};

    for (const [name, check] of Object.entries(opts.checks)) {
      try {
        await check();
        checks[name] = 'ok';
      } catch (err) {
        opts.logger.warn({ err, check: name }, 'Readiness check failed');
        checks[name] = 'error';
      }
    }

    const allOk = Object.values(checks).every((v) => v === 'ok');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'degraded',
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
