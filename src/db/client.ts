// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as roleSchema from './schema/roles.js';
import * as userSchema from './schema/users.js';
import * as revokedTokenSchema from './schema/revokedTokens.js';

const schema = {
  ...roleSchema,
  ...userSchema,
  ...revokedTokenSchema,
};

export type Database = ReturnType<typeof drizzle<typeof schema>>;

export interface DatabaseHandle {
  db: Database;
  close: () => Promise<void>;
}

export function createDatabaseClient(url: string, poolMax = 10): DatabaseHandle {
  const client = postgres(url, {
    max: poolMax,
    idle_timeout: 20,
    max_lifetime: 60 * 30,
    connect_timeout: 10,
    prepare: true,
  });

  return {
    db: drizzle(client, { schema }),
    close: () => client.end(),
  };
}

/**
 * Postgres reports unique constraint violations with SQLSTATE 23505. Newer
 * drizzle releases wrap driver errors, so the cause chain is searched too.
 */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && current.code === '23505') {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}
