/**
 * Idempotency Types
 */

export type IdempotencyState = 'pending' | 'completed' | 'failed_terminal';

/** How an email ended up; every admitted email ends in exactly one of these */
export type Disposition = 'draft_created' | 'fallback_acknowledged' | 'error_queued';

export interface ProcessingOutcome {
  kind: 'completed' | 'failed_terminal';
  disposition: Disposition;
  ticketId?: string;
  draftId?: string;
  completedAt: number;
}

export interface IdempotencyRecord {
  sourceId: string;
  state: IdempotencyState;
  outcome?: ProcessingOutcome;
  admittedAt: number;
  /** A pending record whose lease lapsed may be admitted again */
  leaseExpiresAt: number;
  /** Set once the record is terminal; `expire` drops it after this */
  expiresAt?: number;
  /** Token of the processing attempt that holds the admission */
  owner?: string;
}

export type BeginResult =
  | { status: 'admitted' }
  | { status: 'in_flight' }
  | { status: 'completed'; outcome: ProcessingOutcome };

export interface IdempotencyStore {
  /**
   * Atomic admission: concurrent callers for one source id get exactly one `admitted`.
   * Repeating begin with the owner that holds the pending record is admitted again,
   * so a call whose reply was lost can be retried.
   */
  begin(sourceId: string, owner: string): Promise<BeginResult>;
  /** pending → completed | failed_terminal, once, by the owner only. No-op (with a warning) otherwise. */
  complete(sourceId: string, owner: string, outcome: ProcessingOutcome): Promise<boolean>;
  /**
   * Drop a pending or failed-terminal record so the id can be admitted again. Completed records stay.
   * With an owner, only a record held by that owner is dropped.
   */
  release(sourceId: string, owner?: string): Promise<boolean>;
  /** Remove terminal records whose horizon is at or before `before`. Returns the count removed. */
  expire(before: number): Promise<number>;
  get(sourceId: string): Promise<IdempotencyRecord | null>;
}

export interface IdempotencyStoreOptions {
  /** How long terminal records are remembered */
  expiryMs: number;
  /** How long a pending admission holds before another delivery may take over */
  pendingLeaseMs: number;
  now?: () => number;
}
