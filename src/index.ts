// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { sql } from 'drizzle-orm';
import { loadConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import { createDatabaseClient } from './db/client.js';
import { DrizzleUserRepository } from './db/repositories/DrizzleUserRepository.js';
import { DrizzleRoleRepository } from './db/repositories/DrizzleRoleRepository.js';
import { DrizzleRevokedTokenRepository } from './db/repositories/DrizzleRevokedTokenRepository.js';
import { createServices } from './app.js';
import { createServer } from './api/server.js';

async function main(): Promise<void> {
  // Load configuration
  const config = loadConfig();
  const isDev = config.NODE_ENV === 'development';
  const logger = createLogger(config.LOG_LEVEL, isDev);

  logger.info({ env: config.NODE_ENV }, 'Starting Rosterly...');

  // Connect to PostgreSQL
  const database = createDatabaseClient(config.DATABASE_URL, config.DATABASE_POOL_MAX);
  const { db } = database;
  logger.info('Database client created');

  const services = createServices(
    config,
    {
      users: new DrizzleUserRepository(db),
      roles: new DrizzleRoleRepository(db),
      revokedTokens: new DrizzleRevokedTokenRepository(db),
    },
    logger,
  );

  // Create API server
  const apiServer = await createServer(
    {
      isDev,
      corsOrigins: config.CORS_ALLOWED_ORIGINS,
    },
    {
      authenticator: services.authenticator,
      sessionResolver: services.sessionResolver,
      userService: services.userService,
      roleDirectory: services.roleDirectory,
      readinessChecks: {
        database: () => db.execute(sql`select 1`),
      },
      logger,
    },
  );

  // Start background services
  services.pruner.start(config.REVOCATION_PRUNE_INTERVAL_MS);

  // Start the server
  await apiServer.listen({ port: config.PORT, host: config.HOST });
  logger.info({ port: config.PORT, host: config.HOST }, 'Rosterly API server started');

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down gracefully...');

    services.pruner.stop();

    try {
      await apiServer.close();
      logger.info('API server closed');
    } catch (err) {
      logger.error({ err }, 'Error closing API server');
    }

    try {
      await database.close();
      logger.info('Database disconnected');
    } catch (err) {
      logger.error({ err }, 'Error disconnecting database');
    }

    logger.info('Rosterly shut down successfully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal startup error: ${String(err)}\n`);
  process.exit(1);
});
