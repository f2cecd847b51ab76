import { describe, it, expect, beforeEach } from 'vitest';
import { UserService } from '../UserService.js';
import { RoleDirectory } from '../RoleDirectory.js';
import { ConflictError, ForbiddenError, NotFoundError } from '../../utils/errors.js';
import {
  InMemoryRoleRepository,
  InMemoryUserRepository,
} from '../../../tests/fixtures/memoryRepositories.js';
import {
  TEST_PASSWORD,
  createTestContext,
  createUser,
  logger,
  type TestContext,
} from '../../../tests/fixtures/harness.js';

describe('UserService', () => {
  let ctx: TestContext;
  let service: UserService;

  beforeEach(() => {
    ctx = createTestContext();
    service = ctx.services.userService;
  });

  describe('register', () => {
    it('should create an active user with the default role', async () => {
      const user = await service.register({
        email: 'olga@example.com',
        firstName: 'Ольга',
        lastName: 'Smith-Jones',
        password: TEST_PASSWORD,
      });

      expect(user.isActive).toBe(true);
      expect(user.role).toEqual({ id: 1, name: 'user' });
      expect(user).not.toHaveProperty('passwordHash');
    });

    it('should store an argon2id hash rather than the password', async () => {
      await service.register({
        email: 'olga@example.com',
        firstName: 'Olga',
        lastName: 'Smith',
        password: TEST_PASSWORD,
      });

      const credential = await ctx.users.findCredentialByEmail('olga@example.com');
      expect(credential?.passwordHash.startsWith('$argon2id$')).toBe(true);
      expect(await ctx.services.hasher.verify(credential?.passwordHash ?? '', TEST_PASSWORD)).toBe(
        true,
      );
    });

    it('should reject an email that differs only in case', async () => {
      await createUser(ctx, { email: 'olga@example.com' });

      await expect(
        service.register({
          email: 'OLGA@example.com',
          firstName: 'Olga',
          lastName: 'Smith',
          password: TEST_PASSWORD,
        }),
      ).rejects.toThrow(ConflictError);
    });

    it('should fail when the default role is missing', async () => {
      const roles = new InMemoryRoleRepository(['admin']);
      const bare = new UserService(
        new InMemoryUserRepository(roles),
        new RoleDirectory(roles),
        ctx.services.hasher,
        logger,
        { defaultRoleName: 'user', adminRoleName: 'admin' },
      );

      await expect(
        bare.register({
          email: 'olga@example.com',
          firstName: 'Olga',
          lastName: 'Smith',
          password: TEST_PASSWORD,
        }),
      ).rejects.toThrow('Default role "user" is not seeded');
    });
  });

  describe('lookups', () => {
    it('should get a user by id', async () => {
      const user = await createUser(ctx);
      expect(await service.getUser(user.id)).toEqual(user);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(service.getUser(404)).rejects.toThrow(NotFoundError);
    });

    it('should find a user by email case-insensitively without the hash', async () => {
      const user = await createUser(ctx, { email: 'Mixed.Case@example.com' });

      const found = await service.findByEmail('mixed.case@EXAMPLE.com');

      expect(found).toEqual(user);
      expect(found).not.toHaveProperty('passwordHash');
    });

    it('should throw NotFoundError for an unknown email', async () => {
      await expect(service.findByEmail('ghost@example.com')).rejects.toThrow('User not found');
    });

    it('should list every user', async () => {
      const first = await createUser(ctx);
      const second = await createUser(ctx);
      const users = await service.listUsers();
      expect(users.map((u) => u.id)).toEqual([first.id, second.id]);
    });
  });

  describe('updateUser', () => {
    it('should let a user change their own names', async () => {
      const user = await createUser(ctx);

      const updated = await service.updateUser(user, user.id, { firstName: 'Мария' });

      expect(updated.firstName).toBe('Мария');
      expect(updated.lastName).toBe(user.lastName);
    });

    it('should re-hash a changed password', async () => {
      const user = await createUser(ctx, { email: 'rehash@example.com' });

      await service.updateUser(user, user.id, { password: 'N3wPassword' });

      const credential = await ctx.users.findCredentialByEmail('rehash@example.com');
      const hash = credential?.passwordHash ?? '';
      expect(await ctx.services.hasher.verify(hash, 'N3wPassword')).toBe(true);
      expect(await ctx.services.hasher.verify(hash, TEST_PASSWORD)).toBe(false);
    });

    it('should forbid changing another user unless admin', async () => {
      const actor = await createUser(ctx);
      const target = await createUser(ctx);

      await expect(
        service.updateUser(actor, target.id, { firstName: 'Eve' }),
      ).rejects.toThrow(ForbiddenError);
    });

    it('should let an admin change another user', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });
      const target = await createUser(ctx);

      const updated = await service.updateUser(admin, target.id, { lastName: 'Ivanova' });
      expect(updated.lastName).toBe('Ivanova');
    });

    it('should forbid a non-admin from changing their own role', async () => {
      const user = await createUser(ctx);

      await expect(service.updateUser(user, user.id, { roleId: 3 })).rejects.toThrow(
        ForbiddenError,
      );
    });

    it('should let an admin assign an existing role', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });
      const target = await createUser(ctx);

      const updated = await service.updateUser(admin, target.id, { roleId: 2 });
      expect(updated.role).toEqual({ id: 2, name: 'manager' });
    });

    it('should reject an unknown role with NotFoundError', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });

      await expect(service.updateUser(admin, admin.id, { roleId: 77 })).rejects.toThrow(
        'Role not found',
      );
    });

    it('should reject a taken email with ConflictError', async () => {
      await createUser(ctx, { email: 'taken@example.com' });
      const user = await createUser(ctx);

      await expect(
        service.updateUser(user, user.id, { email: 'Taken@example.com' }),
      ).rejects.toThrow(ConflictError);
    });

    it('should throw NotFoundError when an admin targets a missing user', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });

      await expect(service.updateUser(admin, 999, { firstName: 'Nobody' })).rejects.toThrow(
        NotFoundError,
      );
    });
  });

  describe('deactivateUser', () => {
    it('should deactivate the caller', async () => {
      const user = await createUser(ctx);

      await service.deactivateUser(user, user.id);

      expect((await service.getUser(user.id)).isActive).toBe(false);
    });

    it('should forbid deactivating someone else unless admin', async () => {
      const actor = await createUser(ctx);
      const target = await createUser(ctx);

      await expect(service.deactivateUser(actor, target.id)).rejects.toThrow(ForbiddenError);
    });

    it('should let an admin deactivate another user', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });
      const target = await createUser(ctx);

      await service.deactivateUser(admin, target.id);
      expect((await service.getUser(target.id)).isActive).toBe(false);
    });

    it('should treat an already inactive user as not found', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });
      const target = await createUser(ctx);
      await service.deactivateUser(admin, target.id);

      await expect(service.deactivateUser(admin, target.id)).rejects.toThrow(NotFoundError);
    });

    it('should report a missing user as not found', async () => {
      const admin = await createUser(ctx, { roleName: 'admin' });
      await expect(service.deactivateUser(admin, 999)).rejects.toThrow(NotFoundError);
    });
  });
});
