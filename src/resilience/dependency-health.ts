/**
 * Dependency Health Manager
 *
 * Owns one circuit breaker and one resolved policy per external dependency.
 * Injected into the ResilienceWrapper; nothing reaches it through module state.
 */

import { CircuitBreaker } from './circuit-breaker';
import { CircuitSnapshot, DEPENDENCY_NAMES, DependencyName, DependencyPolicy } from './types';

export type DegradationLevel = 'none' | 'partial' | 'full';

export class DependencyHealthManager {
  private readonly breakers = new Map<DependencyName, CircuitBreaker>();
  private readonly policies = new Map<DependencyName, DependencyPolicy>();

  constructor(
    defaults: DependencyPolicy,
    overrides: Partial<Record<DependencyName, DependencyPolicy>> = {},
    now: () => number = Date.now,
  ) {
    for (const name of DEPENDENCY_NAMES) {
      const policy = overrides[name] ?? defaults;
      this.policies.set(name, policy);
      this.breakers.set(name, new CircuitBreaker(name, policy.circuitBreaker, now));
    }
  }

  breaker(name: DependencyName): CircuitBreaker {
    const breaker = this.breakers.get(name);
    if (!breaker) throw new Error(`Unknown dependency: ${name}`);
    return breaker;
  }

  policy(name: DependencyName): DependencyPolicy {
    const policy = this.policies.get(name);
    if (!policy) throw new Error(`Unknown dependency: ${name}`);
    return policy;
  }

  /** Check if a dependency is accepting calls (circuit not open) */
  isAvailable(name: DependencyName): boolean {
    return this.breaker(name).getState() !== 'open';
  }

  getAllStatuses(): CircuitSnapshot[] {
    return Array.from(this.breakers.values()).map((b) => b.snapshot());
  }

  getDegradationLevel(): DegradationLevel {
    const open = this.getAllStatuses().filter((s) => s.state === 'open').length;
    if (open >= 3) return 'full';
    if (open > 0) return 'partial';
    return 'none';
  }
}
