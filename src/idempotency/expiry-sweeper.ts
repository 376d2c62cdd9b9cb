import { IdempotencyStore } from './types';
import { logger } from '../observability/logger';

/**
 * ExpirySweeper — drops terminal idempotency records past their horizon.
 *
 * Simple setInterval; `expire` only ever removes terminal records, so a sweep
 * racing with live traffic cannot re-admit anything in flight.
 */
export class ExpirySweeper {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private log = logger.child({ component: 'expiry-sweeper' });

  constructor(
    private readonly store: IdempotencyStore,
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  start(): void {
    if (this.intervalHandle) return;
    this.log.info({ intervalMs: this.intervalMs }, 'Idempotency sweeper started');

    this.intervalHandle = setInterval(() => {
      this.sweep().catch((err) => this.log.error({ err }, 'Idempotency sweep failed'));
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Idempotency sweeper stopped');
    }
  }

  /** One sweep; returns the number of records removed */
  async sweep(): Promise<number> {
    if (this.running) {
      this.log.warn('Sweep already running, skipping');
      return 0;
    }
    this.running = true;
    try {
      const removed = await this.store.expire(this.now());
      if (removed > 0) this.log.info({ removed }, 'Expired idempotency records');
      return removed;
    } finally {
      this.running = false;
    }
  }
}
