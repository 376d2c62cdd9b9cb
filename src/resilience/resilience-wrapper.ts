import type { Logger } from 'pino';
import { DependencyHealthManager } from './dependency-health';
import {
  CircuitOpenError,
  PermanentDependencyError,
  StoreUnavailableError,
  TransientDependencyError,
  classifyError,
} from './errors';
import { backoffDelay, systemClock } from './retry';
import { DependencyName, ResilienceClock } from './types';
import { logger } from '../observability/logger';
import { dependencyCallDuration, dependencyRetries } from '../observability/metrics';

/** An outbound call. It receives a signal that aborts on deadline or caller cancellation. */
export type ResilientOperation<T> = (signal: AbortSignal) => Promise<T>;

export interface InvokeOptions {
  /** Caller's cancellation signal (e.g. the event's processing ceiling) */
  signal?: AbortSignal;
  /**
   * Set false for writes that are not safe to repeat. The call then gets a single
   * attempt and a transient failure is surfaced straight away.
   */
  retry?: boolean;
}

/**
 * Retry + circuit breaker + per-attempt deadline around every outbound call.
 *
 * Rejections are always one of:
 * - TransientDependencyError: retries exhausted
 * - PermanentDependencyError: not retryable, propagated on first occurrence
 * - CircuitOpenError: failed fast, the operation was not invoked
 * - the caller signal's abort reason, when the caller cancelled
 */
export class ResilienceWrapper {
  private readonly log: Logger;

  constructor(
    readonly health: DependencyHealthManager,
    private readonly clock: ResilienceClock = systemClock,
  ) {
    this.log = logger.child({ component: 'resilience' });
  }

  async invoke<T>(
    dependency: DependencyName,
    operation: ResilientOperation<T>,
    options: InvokeOptions = {},
  ): Promise<T> {
    const policy = this.health.policy(dependency);
    const breaker = this.health.breaker(dependency);
    const { signal } = options;
    const maxAttempts = options.retry === false ? 1 : policy.retry.maxAttempts;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      const permit = breaker.tryAcquire();
      if (!permit) {
        throw new CircuitOpenError(dependency, breaker.retryAt());
      }

      const started = this.clock.now();
      try {
        const result = await this.attemptWithDeadline(dependency, operation, policy.timeoutMs, signal);
        breaker.recordSuccess(permit);
        dependencyCallDuration.observe({ dependency, status: 'success' }, (this.clock.now() - started) / 1000);
        return result;
      } catch (raw) {
        if (signal?.aborted) {
          breaker.release(permit);
          throw signal.reason;
        }

        const err = classifyError(raw, dependency);
        dependencyCallDuration.observe({ dependency, status: 'error' }, (this.clock.now() - started) / 1000);

        if (err instanceof PermanentDependencyError) {
          // The dependency answered; the request itself was bad. No verdict either way.
          breaker.release(permit);
          this.log.warn({ dependency, err: err.message }, 'Permanent dependency failure');
          throw err;
        }

        // Storage blips are retried like any transient failure
        if (!(err instanceof TransientDependencyError || err instanceof StoreUnavailableError)) {
          breaker.release(permit);
          throw err;
        }

        breaker.recordFailure(permit, err.message);

        const circuitOpened = breaker.getState() === 'open';
        if (attempt >= maxAttempts || circuitOpened) {
          this.log.warn({ dependency, attempts: attempt, circuitOpened, err: err.message }, 'Retries exhausted');
          throw new TransientDependencyError(
            dependency,
            `${dependency} failed after ${attempt} attempt(s): ${err.message}`,
            { cause: err, attempts: attempt },
          );
        }

        const delay = backoffDelay(policy.retry, attempt, this.clock.random);
        dependencyRetries.inc({ dependency });
        this.log.info({ dependency, attempt, delay, err: err.message }, 'Transient failure; retrying');
        await this.clock.sleep(delay, signal);
      }
    }
  }

  /** Race one attempt against its deadline and the caller's signal */
  private async attemptWithDeadline<T>(
    dependency: DependencyName,
    operation: ResilientOperation<T>,
    timeoutMs: number,
    outer?: AbortSignal,
  ): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onOuterAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new TransientDependencyError(dependency, `${dependency} call exceeded ${timeoutMs}ms deadline`);
        controller.abort(err);
        reject(err);
      }, timeoutMs);

      if (outer) {
        onOuterAbort = () => {
          controller.abort(outer.reason);
          reject(outer.reason);
        };
        outer.addEventListener('abort', onOuterAbort, { once: true });
      }
    });

    try {
      const pending = operation(controller.signal);
      // A call that settles after losing the race has nobody waiting on it
      pending.catch((err: unknown) => this.log.debug({ dependency, err }, 'Late settlement after deadline or cancel'));
      return await Promise.race([pending, guard]);
    } finally {
      clearTimeout(timer);
      if (outer && onOuterAbort) outer.removeEventListener('abort', onOuterAbort);
    }
  }
}
