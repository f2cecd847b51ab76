// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { UserRepository } from '../db/repositories/types.js';
import type { PasswordHasher } from '../core/auth/PasswordHasher.js';
import { ForbiddenError, NotFoundError } from '../utils/errors.js';
import { Messages } from '../utils/messages.js';
import type { Identity, UserPatch } from '../types/user.types.js';
import type { Logger } from '../utils/logger.js';
import type { RoleDirectory } from './RoleDirectory.js';

export interface RegisterUserInput {
  email: string;
  firstName: string;
  lastName: string;
  password: string;
}

export interface UpdateUserInput {
  email?: string;
  firstName?: string;
  lastName?: string;
  password?: string;
  roleId?: number;
}

export interface UserServiceOptions {
  defaultRoleName: string;
  adminRoleName: string;
}

export class UserService {
  constructor(
    private readonly users: UserRepository,
    private readonly roles: RoleDirectory,
    private readonly hasher: PasswordHasher,
    private readonly logger: Logger,
    private readonly options: UserServiceOptions,
  ) {}

  isAdmin(identity: Identity): boolean {
    return identity.role.name === this.options.adminRoleName;
  }

  async register(input: RegisterUserInput): Promise<Identity> {
    const role = await this.roles.findRoleByName(this.options.defaultRoleName);
    if (!role) {
      throw new Error(`Default role "${this.options.defaultRoleName}" is not seeded`);
    }

    // No pre-check for the email: the unique index rejects duplicates, races included
    const user = await this.users.create({
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      passwordHash: await this.hasher.hash(input.password),
      roleId: role.id,
    });

    this.logger.info({ userId: user.id, role: role.name }, 'User registered');
    return user;
  }

  async getUser(id: number): Promise<Identity> {
    const user = await this.users.findById(id);
    if (!user) {
      throw new NotFoundError(Messages.USER_NOT_FOUND);
    }
    return user;
  }

  async findByEmail(email: string): Promise<Identity> {
    const credential = await this.users.findCredentialByEmail(email);
    if (!credential) {
      throw new NotFoundError(Messages.USER_NOT_FOUND);
    }
    const { passwordHash: _omitted, ...identity } = credential;
    return identity;
  }

  listUsers(): Promise<Identity[]> {
    return this.users.list();
  }

  async updateUser(actor: Identity, id: number, input: UpdateUserInput): Promise<Identity> {
    this.assertSelfOrAdmin(actor, id);

    const patch: UserPatch = {
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
    };

    if (input.roleId !== undefined) {
      if (!this.isAdmin(actor)) {
        throw new ForbiddenError();
      }
      patch.roleId = (await this.roles.getRole(input.roleId)).id;
    }

    if (input.password !== undefined) {
      patch.passwordHash = await this.hasher.hash(input.password);
    }

    const updated = await this.users.update(id, patch);
    if (!updated) {
      throw new NotFoundError(Messages.USER_NOT_FOUND);
    }

    this.logger.info(
      { userId: id, actorId: actor.id, fields: Object.keys(input) },
      'User updated',
    );
    return updated;
  }

  /**
   * Soft deactivation. Tokens already issued to the user fail on their
   * next use because the session resolver reloads the active flag.
   */
  async deactivateUser(actor: Identity, id: number): Promise<void> {
    this.assertSelfOrAdmin(actor, id);

    const user = await this.users.findById(id);
    if (!user?.isActive) {
      throw new NotFoundError(Messages.USER_NOT_FOUND);
    }

    await this.users.update(id, { isActive: false });
    this.logger.info({ userId: id, actorId: actor.id }, 'User deactivated');
  }

  private assertSelfOrAdmin(actor: Identity, targetId: number): void {
    if (actor.id !== targetId && !this.isAdmin(actor)) {
      throw new ForbiddenError();
    }
  }
}
