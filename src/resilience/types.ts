/**
 * Resilience Types
 */

export type DependencyName =
  | 'idempotency'
  | 'ticketing'
  | 'classifier'
  | 'composer'
  | 'memory'
  | 'knowledge'
  | 'reports'
  | 'drafts'
  | 'notifications'
  | 'error_queue';

export const DEPENDENCY_NAMES: readonly DependencyName[] = [
  'idempotency',
  'ticketing',
  'classifier',
  'composer',
  'memory',
  'knowledge',
  'reports',
  'drafts',
  'notifications',
  'error_queue',
];

export type CircuitStatus = 'closed' | 'open' | 'half_open';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface CircuitBreakerPolicy {
  /** Consecutive transient failures that open the circuit */
  failureThreshold: number;
  /** Time an open circuit waits before letting one trial through */
  cooldownMs: number;
}

export interface DependencyPolicy {
  retry: RetryPolicy;
  circuitBreaker: CircuitBreakerPolicy;
  /** Deadline applied to every single attempt */
  timeoutMs: number;
}

export interface CircuitSnapshot {
  dependency: DependencyName;
  state: CircuitStatus;
  consecutiveFailures: number;
  lastTransitionAt: number;
  lastError?: string;
  trialInFlight: boolean;
}

/** Injected so tests control time and randomness */
export interface ResilienceClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  random(): number;
}
