// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { argon2id, hash, verify } from 'argon2';

export interface PasswordHasherConfig {
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export class PasswordHasher {
  private dummyHash: Promise<string> | null = null;

  constructor(private readonly config: PasswordHasherConfig) {}

  hash(password: string): Promise<string> {
    return hash(password, {
      type: argon2id,
      memoryCost: this.config.memoryCost,
      timeCost: this.config.timeCost,
      parallelism: this.config.parallelism,
    });
  }

  /** argon2 compares digests in constant time. */
  verify(passwordHash: string, password: string): Promise<boolean> {
    return verify(passwordHash, password);
  }

  /**
   * Burns the same work as a real verification so that an unknown email
   * takes as long to reject as a wrong password.
   */
  async verifyAgainstDummy(password: string): Promise<void> {
    this.dummyHash ??= this.hash('unused-dummy-password').catch((error: unknown) => {
      // Cleared so that the next miss retries
      this.dummyHash = null;
      throw error;
    });
    await verify(await this.dummyHash, password);
  }
}
