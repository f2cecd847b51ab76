// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { RoleRepository } from '../db/repositories/types.js';
import { NotFoundError } from '../utils/errors.js';
import { Messages } from '../utils/messages.js';
import type { Role } from '../types/user.types.js';

/**
 * Read-only view of the roles table. Roles are rows, not an enum, so new
 * ones only need a seed or migration.
 */
export class RoleDirectory {
  constructor(private readonly roles: RoleRepository) {}

  listRoles(): Promise<Role[]> {
    return this.roles.list();
  }

  async getRole(id: number): Promise<Role> {
    const role = await this.roles.findById(id);
    if (!role) {
      throw new NotFoundError(Messages.ROLE_NOT_FOUND);
    }
    return role;
  }

  findRoleByName(name: string): Promise<Role | null> {
    return this.roles.findByName(name);
  }
}
