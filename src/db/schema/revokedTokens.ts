// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { pgTable, serial, varchar, integer, timestamp, index } from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const revokedTokens = pgTable(
  'revoked_tokens',
  {
    id: serial('id').primaryKey(),
    jti: varchar('jti', { length: 255 }).notNull().unique(),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    revokedAt: timestamp('revoked_at', { withTimezone: true }).notNull().defaultNow(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => [index('revoked_tokens_expires_at_idx').on(table.expiresAt)],
);
