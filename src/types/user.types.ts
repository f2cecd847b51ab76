// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

export interface Role {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type RoleRef = Pick<Role, 'id' | 'name'>;

/**
 * A user as loaded from the credential store, with its current role.
 */
export interface Identity {
  id: number;
  email: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  role: RoleRef;
  createdAt: Date;
  updatedAt: Date;
}

export interface StoredCredential extends Identity {
  passwordHash: string;
}

export interface NewUser {
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  roleId: number;
}

export interface UserPatch {
  email?: string;
  firstName?: string;
  lastName?: string;
  passwordHash?: string;
  roleId?: number;
  isActive?: boolean;
}

export interface UserView {
  id: number;
  email: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  role: RoleRef;
  createdAt: string;
  updatedAt: string;
}
