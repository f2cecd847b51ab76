// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { PasswordHasher } from './core/auth/PasswordHasher.js';
import { TokenCodec } from './core/auth/TokenCodec.js';
import { RevocationLedger } from './core/auth/RevocationLedger.js';
import { SessionResolver } from './core/auth/SessionResolver.js';
import { Authenticator } from './core/auth/Authenticator.js';
import { RoleDirectory } from './services/RoleDirectory.js';
import { UserService } from './services/UserService.js';
import { RevocationPruner } from './services/RevocationPruner.js';
import type {
  RevokedTokenRepository,
  RoleRepository,
  UserRepository,
} from './db/repositories/types.js';
import type { Clock } from './types/auth.types.js';
import type { Config } from './utils/config.js';
import type { Logger } from './utils/logger.js';

export interface Repositories {
  users: UserRepository;
  roles: RoleRepository;
  revokedTokens: RevokedTokenRepository;
}

export interface Services {
  hasher: PasswordHasher;
  tokenCodec: TokenCodec;
  ledger: RevocationLedger;
  sessionResolver: SessionResolver;
  authenticator: Authenticator;
  roleDirectory: RoleDirectory;
  userService: UserService;
  pruner: RevocationPruner;
}

/**
 * Wires the service graph over a set of repositories. The clock is only
 * replaced in tests.
 */
export function createServices(
  config: Config,
  repositories: Repositories,
  logger: Logger,
  clock: Clock = () => new Date(),
): Services {
  const hasher = new PasswordHasher({
    memoryCost: config.ARGON2_MEMORY_COST,
    timeCost: config.ARGON2_TIME_COST,
    parallelism: config.ARGON2_PARALLELISM,
  });

  const tokenCodec = new TokenCodec(
    {
      secret: config.JWT_SECRET,
      ttlSeconds: config.JWT_TTL_SECONDS,
      issuer: config.JWT_ISSUER,
      audience: config.JWT_AUDIENCE,
    },
    clock,
  );

  const ledger = new RevocationLedger(
    repositories.revokedTokens,
    logger.child({ component: 'revocation-ledger' }),
    clock,
  );

  const sessionResolver = new SessionResolver(
    tokenCodec,
    ledger,
    repositories.users,
    logger.child({ component: 'session-resolver' }),
  );

  const authenticator = new Authenticator(
    repositories.users,
    hasher,
    tokenCodec,
    sessionResolver,
    ledger,
    logger.child({ component: 'authenticator' }),
    { unifyInactiveError: config.AUTH_UNIFY_INACTIVE_ERROR },
  );

  const roleDirectory = new RoleDirectory(repositories.roles);

  const userService = new UserService(
    repositories.users,
    roleDirectory,
    hasher,
    logger.child({ component: 'user-service' }),
    {
      defaultRoleName: config.DEFAULT_ROLE_NAME,
      adminRoleName: config.ADMIN_ROLE_NAME,
    },
  );

  const pruner = new RevocationPruner(ledger, logger.child({ component: 'revocation-pruner' }));

  return {
    hasher,
    tokenCodec,
    ledger,
    sessionResolver,
    authenticator,
    roleDirectory,
    userService,
    pruner,
  };
}
