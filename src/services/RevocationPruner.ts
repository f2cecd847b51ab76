// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { RevocationLedger } from '../core/auth/RevocationLedger.js';
import type { Logger } from '../utils/logger.js';

/**
 * Periodically drops revocation records for tokens that have expired.
 * Runs outside request handling; a failed run is logged and retried on the
 * next tick.
 */
export class RevocationPruner {
  private pruneInterval: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    private readonly ledger: RevocationLedger,
    private readonly logger: Logger,
  ) {}

  start(intervalMs = 3_600_000): void {
    if (this.pruneInterval) return;

    this.pruneInterval = setInterval(() => {
      this.runOnce().catch((err: unknown) => {
        this.logger.error({ err }, 'Revocation pruning failed');
      });
    }, intervalMs);
    this.pruneInterval.unref();
    this.logger.info({ intervalMs }, 'Revocation pruner started');
  }

  stop(): void {
    if (this.pruneInterval) {
      clearInterval(this.pruneInterval);
      this.pruneInterval = null;
      this.logger.info('Revocation pruner stopped');
    }
  }

  /** Skips the run when the previous one is still in flight. */
  async runOnce(): Promise<number> {
    if (this.running) return 0;

    this.running = true;
    try {
      return await this.ledger.pruneExpired();
    } finally {
      this.running = false;
    }
  }
}
