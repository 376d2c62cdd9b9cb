/**
 * Pipeline error taxonomy.
 *
 * Every error the pipeline reasons about carries a stable `code` so callers can
 * branch on it without `instanceof` chains across module boundaries.
 */

import { DependencyName } from './types';

export type PipelineErrorCode =
  | 'TRANSIENT_DEPENDENCY'
  | 'PERMANENT_DEPENDENCY'
  | 'CIRCUIT_OPEN'
  | 'MALFORMED_INPUT'
  | 'DUPLICATE_DELIVERY'
  | 'PROCESSING_TIMEOUT'
  | 'STORE_UNAVAILABLE'
  | 'LANE_FULL';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Retryable failure of an external collaborator (timeouts, 5xx, throttling, network) */
export class TransientDependencyError extends PipelineError {
  readonly code = 'TRANSIENT_DEPENDENCY' as const;
  readonly attempts: number;

  constructor(
    readonly dependency: DependencyName | undefined,
    message: string,
    options?: { cause?: unknown; attempts?: number },
  ) {
    super(message, options);
    this.attempts = options?.attempts ?? 1;
  }
}

/** Non-retryable failure (malformed request, authorization, contract violation) */
export class PermanentDependencyError extends PipelineError {
  readonly code = 'PERMANENT_DEPENDENCY' as const;

  constructor(
    readonly dependency: DependencyName | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Call rejected without touching the dependency because its circuit is open */
export class CircuitOpenError extends PipelineError {
  readonly code = 'CIRCUIT_OPEN' as const;

  constructor(readonly dependency: DependencyName, readonly retryAt: number) {
    super(`Circuit open for ${dependency}`);
  }
}

export class MalformedInputError extends PipelineError {
  readonly code = 'MALFORMED_INPUT' as const;
}

/** Re-delivery of an already admitted source id. Absorbed, never surfaced to senders. */
export class DuplicateDeliveryError extends PipelineError {
  readonly code = 'DUPLICATE_DELIVERY' as const;

  constructor(
    readonly sourceId: string,
    readonly state: 'in_flight' | 'completed',
  ) {
    super(`Duplicate delivery of ${sourceId} (${state})`);
  }
}

export class ProcessingTimeoutError extends PipelineError {
  readonly code = 'PROCESSING_TIMEOUT' as const;

  constructor(readonly sourceId: string, readonly ceilingMs: number) {
    super(`Processing of ${sourceId} exceeded ${ceilingMs}ms`);
  }
}

export class StoreUnavailableError extends PipelineError {
  readonly code = 'STORE_UNAVAILABLE' as const;
}

export class LaneFullError extends PipelineError {
  readonly code = 'LANE_FULL' as const;

  constructor(readonly laneKey: string, readonly capacity: number) {
    super(`Lane ${laneKey} is at capacity (${capacity})`);
  }
}

/** A failure that ends the current attempt for good: nothing further will retry it */
export function isTerminal(err: unknown): boolean {
  return (
    err instanceof TransientDependencyError ||
    err instanceof PermanentDependencyError ||
    err instanceof CircuitOpenError ||
    err instanceof StoreUnavailableError
  );
}

const TRANSIENT_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function readNumber(obj: object, key: string): number | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'number' ? value : undefined;
}

function readString(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map a foreign error (SDK, fetch, ioredis) onto the transient/permanent split.
 * Errors already in the taxonomy pass through unchanged.
 */
export function classifyError(err: unknown, dependency?: DependencyName): PipelineError {
  if (err instanceof PipelineError) return err;

  const message = err instanceof Error ? err.message : String(err);

  if (typeof err === 'object' && err !== null) {
    const status = readNumber(err, 'status') ?? readNumber(err, 'statusCode');
    if (status !== undefined) {
      return TRANSIENT_STATUS.has(status) || status >= 500
        ? new TransientDependencyError(dependency, message, { cause: err })
        : new PermanentDependencyError(dependency, message, { cause: err });
    }

    const code = readString(err, 'code');
    if (code && TRANSIENT_CODES.has(code)) {
      return new TransientDependencyError(dependency, message, { cause: err });
    }
  }

  // Unknown failures count as transient
  return new TransientDependencyError(dependency, message, { cause: err });
}

/** HTTP status → error, for adapters that talk to REST collaborators */
export function errorFromStatus(dependency: DependencyName, status: number, detail: string): PipelineError {
  const message = `${dependency} responded ${status}: ${detail.slice(0, 200)}`;
  return TRANSIENT_STATUS.has(status) || status >= 500
    ? new TransientDependencyError(dependency, message)
    : new PermanentDependencyError(dependency, message);
}
