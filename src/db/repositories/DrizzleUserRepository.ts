// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { asc, eq, sql } from 'drizzle-orm';
import { users } from '../schema/users.js';
import { roles } from '../schema/roles.js';
import { isUniqueViolation, type Database } from '../client.js';
import { ConflictError } from '../../utils/errors.js';
import { Messages } from '../../utils/messages.js';
import type {
  Identity,
  NewUser,
  StoredCredential,
  UserPatch,
} from '../../types/user.types.js';
import type { UserRepository } from './types.js';

const identityColumns = {
  id: users.id,
  email: users.email,
  firstName: users.firstName,
  lastName: users.lastName,
  isActive: users.isActive,
  createdAt: users.createdAt,
  updatedAt: users.updatedAt,
  role: {
    id: roles.id,
    name: roles.name,
  },
};

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findById(id: number): Promise<Identity | null> {
    const [row] = await this.db
      .select(identityColumns)
      .from(users)
      .innerJoin(roles, eq(users.roleId, roles.id))
      .where(eq(users.id, id))
      .limit(1);

    return row ?? null;
  }

  async findCredentialByEmail(email: string): Promise<StoredCredential | null> {
    // Matches the lower(email) unique index
    const [row] = await this.db
      .select({ ...identityColumns, passwordHash: users.passwordHash })
      .from(users)
      .innerJoin(roles, eq(users.roleId, roles.id))
      .where(sql`lower(${users.email}) = lower(${email})`)
      .limit(1);

    return row ?? null;
  }

  async list(): Promise<Identity[]> {
    return this.db
      .select(identityColumns)
      .from(users)
      .innerJoin(roles, eq(users.roleId, roles.id))
      .orderBy(asc(users.id));
  }

  async create(user: NewUser): Promise<Identity> {
    let inserted: { id: number } | undefined;
    try {
      [inserted] = await this.db.insert(users).values(user).returning({ id: users.id });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(Messages.EMAIL_TAKEN);
      }
      throw error;
    }

    const created = inserted ? await this.findById(inserted.id) : null;
    if (!created) {
      throw new Error('Failed to create user');
    }
    return created;
  }

  async update(id: number, patch: UserPatch): Promise<Identity | null> {
    let updated: { id: number } | undefined;
    try {
      [updated] = await this.db
        .update(users)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning({ id: users.id });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(Messages.EMAIL_TAKEN);
      }
      throw error;
    }

    return updated ? this.findById(updated.id) : null;
  }
}
