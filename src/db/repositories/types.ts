// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { RevocationRecord } from '../../types/auth.types.js';
import type {
  Identity,
  NewUser,
  Role,
  StoredCredential,
  UserPatch,
} from '../../types/user.types.js';

/**
 * Credential store. Implementations enforce case-insensitive email
 * uniqueness themselves and raise ConflictError when it is violated.
 */
export interface UserRepository {
  findById(id: number): Promise<Identity | null>;
  findCredentialByEmail(email: string): Promise<StoredCredential | null>;
  list(): Promise<Identity[]>;
  create(user: NewUser): Promise<Identity>;
  update(id: number, patch: UserPatch): Promise<Identity | null>;
}

export interface RoleRepository {
  list(): Promise<Role[]>;
  findById(id: number): Promise<Role | null>;
  findByName(name: string): Promise<Role | null>;
}

export interface RevokedTokenRepository {
  /** Returns false when a record with the same token id already exists. */
  insert(record: RevocationRecord): Promise<boolean>;
  exists(tokenId: string): Promise<boolean>;
  deleteExpiredBefore(cutoff: Date): Promise<number>;
}
