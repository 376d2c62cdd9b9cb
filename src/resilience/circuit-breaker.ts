import type { Logger } from 'pino';
import { CircuitBreakerPolicy, CircuitSnapshot, CircuitStatus, DependencyName } from './types';
import { logger } from '../observability/logger';
import { circuitTransitions } from '../observability/metrics';

/**
 * Admission ticket for one call. Verdicts carry it back so the breaker can
 * tell which state the call was admitted under.
 */
export interface CircuitPermit {
  readonly generation: number;
  readonly trial: boolean;
}

/**
 * Circuit breaker for one dependency.
 *
 * closed ─(failureThreshold consecutive failures)→ open ─(cooldown)→ half_open
 * half_open admits a single trial: success closes, failure re-opens.
 *
 * Every transition starts a new generation. A verdict whose permit belongs to an
 * earlier generation is dropped, so a slow call admitted while closed cannot
 * close a circuit that opened after it started.
 */
export class CircuitBreaker {
  private state: CircuitStatus = 'closed';
  private generation = 0;
  private consecutiveFailures = 0;
  private lastTransitionAt: number;
  private lastError?: string;
  private trialInFlight = false;
  private readonly log: Logger;

  constructor(
    readonly dependency: DependencyName,
    private readonly policy: CircuitBreakerPolicy,
    private readonly now: () => number = Date.now,
  ) {
    this.lastTransitionAt = this.now();
    this.log = logger.child({ component: 'circuit-breaker', dependency });
  }

  /**
   * Ask for permission to make one call. Returns null when the call must fail fast.
   * A caller holding a permit MUST report back via recordSuccess/recordFailure/release.
   */
  tryAcquire(): CircuitPermit | null {
    switch (this.state) {
      case 'closed':
        return { generation: this.generation, trial: false };
      case 'open':
        if (this.now() - this.lastTransitionAt < this.policy.cooldownMs) return null;
        this.transition('half_open');
        this.trialInFlight = true;
        return { generation: this.generation, trial: true };
      case 'half_open':
        if (this.trialInFlight) return null;
        this.trialInFlight = true;
        return { generation: this.generation, trial: true };
    }
  }

  recordSuccess(permit: CircuitPermit): void {
    if (this.isStale(permit, 'success')) return;
    this.consecutiveFailures = 0;
    this.lastError = undefined;
    if (this.state === 'half_open') {
      this.trialInFlight = false;
      this.transition('closed');
    }
  }

  recordFailure(permit: CircuitPermit, error: string): void {
    if (this.isStale(permit, 'failure')) return;
    this.consecutiveFailures++;
    this.lastError = error;

    if (this.state === 'half_open') {
      this.trialInFlight = false;
      this.transition('open');
      return;
    }

    if (this.consecutiveFailures >= this.policy.failureThreshold) {
      this.transition('open');
    }
  }

  /** Hand the permit back without a verdict (cancelled call, or a permanent error) */
  release(permit: CircuitPermit): void {
    if (this.isStale(permit, 'release')) return;
    if (permit.trial) this.trialInFlight = false;
  }

  /** Earliest time an open circuit lets a trial through */
  retryAt(): number {
    return this.lastTransitionAt + this.policy.cooldownMs;
  }

  getState(): CircuitStatus {
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    return {
      dependency: this.dependency,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastTransitionAt: this.lastTransitionAt,
      lastError: this.lastError,
      trialInFlight: this.trialInFlight,
    };
  }

  private isStale(permit: CircuitPermit, verdict: string): boolean {
    if (permit.generation === this.generation) return false;
    this.log.debug({ verdict, permitGeneration: permit.generation, generation: this.generation }, 'Dropped stale verdict');
    return true;
  }

  private transition(to: CircuitStatus): void {
    const from = this.state;
    this.state = to;
    this.generation++;
    this.lastTransitionAt = this.now();
    circuitTransitions.inc({ dependency: this.dependency, to });

    if (to === 'open') {
      this.log.warn({ from, failures: this.consecutiveFailures, lastError: this.lastError }, 'Circuit opened');
    } else {
      this.log.info({ from, to }, 'Circuit state changed');
    }
  }
}
