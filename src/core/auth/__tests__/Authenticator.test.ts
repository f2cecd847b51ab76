import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  AccountInactiveError,
  ExpiredTokenError,
  InvalidCredentialsError,
  MissingTokenError,
  RevokedTokenError,
  TokenAlreadyRevokedError,
  ValidationError,
} from '../../../utils/errors.js';
import {
  TEST_PASSWORD,
  createTestContext,
  createUser,
  type TestContext,
} from '../../../../tests/fixtures/harness.js';
import type { Identity } from '../../../types/user.types.js';

describe('Authenticator', () => {
  let ctx: TestContext;
  let user: Identity;

  beforeEach(async () => {
    ctx = createTestContext();
    user = await createUser(ctx, { email: 'Ivan.Sidorov@Example.com' });
  });

  describe('authenticate', () => {
    it('should issue a bearer token for valid credentials', async () => {
      const issued = await ctx.services.authenticator.authenticate(
        'Ivan.Sidorov@Example.com',
        TEST_PASSWORD,
      );

      expect(issued.tokenType).toBe('bearer');
      expect(issued.expiresIn).toBe(3600);
      expect(issued.claims.subjectId).toBe(user.id);
      expect(issued.claims.active).toBe(true);
      expect(ctx.services.tokenCodec.decode(issued.token)).toEqual(issued.claims);
    });

    it('should match the email case-insensitively', async () => {
      const issued = await ctx.services.authenticator.authenticate(
        'ivan.sidorov@example.com',
        TEST_PASSWORD,
      );
      expect(issued.claims.subjectId).toBe(user.id);
    });

    it('should not write anything on success', async () => {
      await ctx.services.authenticator.authenticate('ivan.sidorov@example.com', TEST_PASSWORD);
      expect(ctx.revokedTokens.size).toBe(0);
    });

    it('should issue distinct token ids for repeated logins', async () => {
      const first = await ctx.services.authenticator.authenticate(
        'ivan.sidorov@example.com',
        TEST_PASSWORD,
      );
      const second = await ctx.services.authenticator.authenticate(
        'ivan.sidorov@example.com',
        TEST_PASSWORD,
      );
      expect(first.claims.tokenId).not.toBe(second.claims.tokenId);
    });

    it('should reject a wrong password with InvalidCredentialsError', async () => {
      await expect(
        ctx.services.authenticator.authenticate('ivan.sidorov@example.com', 'Wrong-Passw0rd'),
      ).rejects.toThrow(InvalidCredentialsError);
    });

    it('should reject an unknown email with the same error and message', async () => {
      const unknown = ctx.services.authenticator.authenticate('nobody@example.com', TEST_PASSWORD);
      const wrong = ctx.services.authenticator.authenticate(
        'ivan.sidorov@example.com',
        'Wrong-Passw0rd',
      );

      const [unknownResult, wrongResult] = await Promise.allSettled([unknown, wrong]);
      expect(unknownResult.status).toBe('rejected');
      expect(wrongResult.status).toBe('rejected');
      if (unknownResult.status === 'rejected' && wrongResult.status === 'rejected') {
        expect(unknownResult.reason).toBeInstanceOf(InvalidCredentialsError);
        expect(wrongResult.reason).toBeInstanceOf(InvalidCredentialsError);
        expect(unknownResult.reason).toMatchObject({
          message: 'Invalid email or password',
          code: 'INVALID_CREDENTIALS',
          statusCode: 401,
        });
        expect(wrongResult.reason).toMatchObject({
          message: 'Invalid email or password',
          code: 'INVALID_CREDENTIALS',
          statusCode: 401,
        });
      }
    });

    it('should run a password verification for unknown emails', async () => {
      const dummy = vi.spyOn(ctx.services.hasher, 'verifyAgainstDummy');

      await expect(
        ctx.services.authenticator.authenticate('nobody@example.com', TEST_PASSWORD),
      ).rejects.toThrow(InvalidCredentialsError);
      expect(dummy).toHaveBeenCalledWith(TEST_PASSWORD);
    });

    it('should reject a malformed email before touching the store', async () => {
      const lookup = vi.spyOn(ctx.users, 'findCredentialByEmail');

      await expect(
        ctx.services.authenticator.authenticate('not-an-email', TEST_PASSWORD),
      ).rejects.toThrow(ValidationError);
      expect(lookup).not.toHaveBeenCalled();
    });

    it('should reject an oversized password as invalid credentials without hashing', async () => {
      const verify = vi.spyOn(ctx.services.hasher, 'verify');

      await expect(
        ctx.services.authenticator.authenticate('ivan.sidorov@example.com', 'A1a'.repeat(400)),
      ).rejects.toThrow(InvalidCredentialsError);
      expect(verify).not.toHaveBeenCalled();
    });

    it('should reject an inactive account once the password matches', async () => {
      await ctx.users.update(user.id, { isActive: false });

      await expect(
        ctx.services.authenticator.authenticate('ivan.sidorov@example.com', TEST_PASSWORD),
      ).rejects.toThrow(AccountInactiveError);
    });

    it('should not reveal inactivity to a wrong password', async () => {
      await ctx.users.update(user.id, { isActive: false });

      await expect(
        ctx.services.authenticator.authenticate('ivan.sidorov@example.com', 'Wrong-Passw0rd'),
      ).rejects.toThrow(InvalidCredentialsError);
    });

    it('should report inactivity as invalid credentials when unified', async () => {
      const unified = createTestContext({ AUTH_UNIFY_INACTIVE_ERROR: 'true' });
      const member = await createUser(unified, { email: 'quiet@example.com' });
      await unified.users.update(member.id, { isActive: false });

      await expect(
        unified.services.authenticator.authenticate('quiet@example.com', TEST_PASSWORD),
      ).rejects.toThrow(InvalidCredentialsError);
    });
  });

  describe('logout', () => {
    async function login(): Promise<string> {
      const issued = await ctx.services.authenticator.authenticate(
        'ivan.sidorov@example.com',
        TEST_PASSWORD,
      );
      return issued.token;
    }

    it('should revoke the presented token until its natural expiry', async () => {
      const token = await login();
      const claims = ctx.services.tokenCodec.decode(token);

      await ctx.services.authenticator.logout(token);

      expect(ctx.revokedTokens.get(claims.tokenId)).toEqual({
        tokenId: claims.tokenId,
        subjectId: user.id,
        revokedAt: ctx.clock.now(),
        expiresAt: new Date(claims.expiresAt * 1000),
      });
      await expect(ctx.services.sessionResolver.resolve(token)).rejects.toThrow(
        RevokedTokenError,
      );
    });

    it('should leave other sessions of the same user alive', async () => {
      const first = await login();
      const second = await login();

      await ctx.services.authenticator.logout(first);

      const identity = await ctx.services.sessionResolver.resolve(second);
      expect(identity.id).toBe(user.id);
    });

    it('should refuse a second logout with the same token', async () => {
      const token = await login();
      await ctx.services.authenticator.logout(token);

      await expect(ctx.services.authenticator.logout(token)).rejects.toThrow(
        TokenAlreadyRevokedError,
      );
      expect(ctx.revokedTokens.size).toBe(1);
    });

    it('should let exactly one of two concurrent logouts succeed', async () => {
      const token = await login();

      const results = await Promise.allSettled([
        ctx.services.authenticator.logout(token),
        ctx.services.authenticator.logout(token),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(TokenAlreadyRevokedError);
    });

    it('should reject a missing token', async () => {
      await expect(ctx.services.authenticator.logout(undefined)).rejects.toThrow(
        MissingTokenError,
      );
    });

    it('should reject an expired token without recording it', async () => {
      const token = await login();
      ctx.clock.advance(3600 * 1000);

      await expect(ctx.services.authenticator.logout(token)).rejects.toThrow(ExpiredTokenError);
      expect(ctx.revokedTokens.size).toBe(0);
    });

    it('should reject a token whose user no longer exists without recording it', async () => {
      const claims = ctx.services.tokenCodec.buildClaims({ id: 999, isActive: true });
      const token = ctx.services.tokenCodec.issue(claims);

      await expect(ctx.services.authenticator.logout(token)).rejects.toThrow(
        AccountInactiveError,
      );
      expect(ctx.revokedTokens.size).toBe(0);
    });

    it('should not reach the revocation store for a missing user', async () => {
      const insert = vi.spyOn(ctx.revokedTokens, 'insert');
      const token = ctx.services.tokenCodec.issue(
        ctx.services.tokenCodec.buildClaims({ id: 999, isActive: true }),
      );

      await expect(ctx.services.authenticator.logout(token)).rejects.toThrow(
        AccountInactiveError,
      );
      expect(insert).not.toHaveBeenCalled();
      await expect(
        ctx.revokedTokens.insert({
          tokenId: 'orphan',
          subjectId: 999,
          revokedAt: ctx.clock.now(),
          expiresAt: ctx.clock.now(),
        }),
      ).rejects.toMatchObject({ code: '23503' });
    });

    it('should still revoke the token of a deactivated account', async () => {
      const token = await login();
      await ctx.users.update(user.id, { isActive: false });

      await ctx.services.authenticator.logout(token);
      expect(ctx.revokedTokens.size).toBe(1);
    });
  });
});
