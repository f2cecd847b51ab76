// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),

  DATABASE_URL: z.string().url().startsWith('postgresql://'),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),

  JWT_SECRET: z
    .string()
    .refine((v) => Buffer.byteLength(v, 'utf8') >= 32, 'Must be at least 32 bytes'),
  JWT_TTL_SECONDS: z.coerce.number().int().min(60).max(2_592_000).default(3600),
  JWT_ISSUER: z.string().min(1).default('rosterly'),
  JWT_AUDIENCE: z.string().min(1).default('rosterly-api'),

  ARGON2_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
  ARGON2_TIME_COST: z.coerce.number().int().min(2).default(3),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).default(4),

  DEFAULT_ROLE_NAME: z.string().min(1).max(50).default('user'),
  ADMIN_ROLE_NAME: z.string().min(1).max(50).default('admin'),
  AUTH_UNIFY_INACTIVE_ERROR: booleanFlag,

  REVOCATION_PRUNE_INTERVAL_MS: z.coerce.number().int().min(1000).default(3_600_000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  CORS_ALLOWED_ORIGINS: z
    .string()
    .default('')
    .transform((v) =>
      v
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

/**
 * Parses the environment into an immutable configuration object.
 * The result is handed to constructors at startup; nothing reads it globally.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new ConfigError(`Invalid environment configuration:\n${messages}`);
  }

  return Object.freeze(result.data);
}
