// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { asc, eq } from 'drizzle-orm';
import { roles } from '../schema/roles.js';
import type { Database } from '../client.js';
import type { Role } from '../../types/user.types.js';
import type { RoleRepository } from './types.js';

export class DrizzleRoleRepository implements RoleRepository {
  constructor(private readonly db: Database) {}

  async list(): Promise<Role[]> {
    return this.db.select().from(roles).orderBy(asc(roles.id));
  }

  async findById(id: number): Promise<Role | null> {
    const [role] = await this.db.select().from(roles).where(eq(roles.id, id)).limit(1);
    return role ?? null;
  }

  async findByName(name: string): Promise<Role | null> {
    const [role] = await this.db.select().from(roles).where(eq(roles.name, name)).limit(1);
    return role ?? null;
  }
}
