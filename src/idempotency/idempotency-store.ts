/**
 * Idempotency Store
 *
 * Maps source message ids to their processing outcome.
 * Redis: SET NX PX for admission, Lua compare-and-set for completion and release,
 * record TTL as the expiry horizon.
 * In-memory fallback for dev and tests.
 */

import Redis from 'ioredis';
import type { Logger } from 'pino';
import {
  BeginResult,
  IdempotencyRecord,
  IdempotencyStore,
  IdempotencyStoreOptions,
  ProcessingOutcome,
} from './types';
import { StoreUnavailableError } from '../resilience/errors';
import { logger } from '../observability/logger';

const IDEMPOTENCY_PREFIX = 'idem:';

function isOutcome(value: unknown): value is ProcessingOutcome {
  if (typeof value !== 'object' || value === null) return false;
  const kind: unknown = Reflect.get(value, 'kind');
  const disposition: unknown = Reflect.get(value, 'disposition');
  return (
    (kind === 'completed' || kind === 'failed_terminal') &&
    (disposition === 'draft_created' || disposition === 'fallback_acknowledged' || disposition === 'error_queued') &&
    typeof Reflect.get(value, 'completedAt') === 'number'
  );
}

function isRecord(value: unknown): value is IdempotencyRecord {
  if (typeof value !== 'object' || value === null) return false;
  const state: unknown = Reflect.get(value, 'state');
  const outcome: unknown = Reflect.get(value, 'outcome');
  return (
    typeof Reflect.get(value, 'sourceId') === 'string' &&
    (state === 'pending' || state === 'completed' || state === 'failed_terminal') &&
    typeof Reflect.get(value, 'admittedAt') === 'number' &&
    typeof Reflect.get(value, 'leaseExpiresAt') === 'number' &&
    ['string', 'undefined'].includes(typeof Reflect.get(value, 'owner')) &&
    (outcome === undefined || isOutcome(outcome))
  );
}

function toBeginResult(record: IdempotencyRecord, owner: string): BeginResult {
  if (record.state === 'pending') return record.owner === owner ? { status: 'admitted' } : { status: 'in_flight' };
  if (!record.outcome) return { status: 'in_flight' };
  return { status: 'completed', outcome: record.outcome };
}

function isReleasable(record: IdempotencyRecord, owner?: string): boolean {
  if (record.state === 'completed') return false;
  return owner === undefined || record.owner === owner;
}

// Replace the record only if it still holds the value that was read
const COMPARE_AND_SET_SCRIPT = `
if redis.call('GET', KEYS[1]) ~= ARGV[1] then return 0 end
redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
return 1
`;

const COMPARE_AND_DELETE_SCRIPT = `
if redis.call('GET', KEYS[1]) ~= ARGV[1] then return 0 end
return redis.call('DEL', KEYS[1])
`;

interface StoredRecord {
  raw: string;
  record: IdempotencyRecord;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisIdempotencyStore implements IdempotencyStore {
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly redis: Redis,
    private readonly options: IdempotencyStoreOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.log = logger.child({ component: 'idempotency-store', backend: 'redis' });
  }

  async begin(sourceId: string, owner: string): Promise<BeginResult> {
    const now = this.now();
    const pending: IdempotencyRecord = {
      sourceId,
      state: 'pending',
      admittedAt: now,
      leaseExpiresAt: now + this.options.pendingLeaseMs,
      owner,
    };

    return this.guard('begin', async () => {
      // The pending key lives for one lease; a lapsed lease simply disappears
      const set = await this.redis.set(this.key(sourceId), JSON.stringify(pending), 'PX', this.options.pendingLeaseMs, 'NX');
      if (set === 'OK') return { status: 'admitted' };

      const existing = await this.read(sourceId);
      if (existing) return toBeginResult(existing.record, owner);

      // Lease lapsed between SET and GET: one more admission attempt
      const retry = await this.redis.set(this.key(sourceId), JSON.stringify(pending), 'PX', this.options.pendingLeaseMs, 'NX');
      return retry === 'OK' ? { status: 'admitted' } : { status: 'in_flight' };
    });
  }

  async complete(sourceId: string, owner: string, outcome: ProcessingOutcome): Promise<boolean> {
    return this.guard('complete', async () => {
      const existing = await this.read(sourceId);
      if (!existing || existing.record.state !== 'pending' || existing.record.owner !== owner) {
        this.log.warn(
          { sourceId, state: existing?.record.state ?? 'missing', heldBy: existing?.record.owner },
          'Completion for a record this attempt does not hold; ignored',
        );
        return false;
      }
      const record: IdempotencyRecord = {
        ...existing.record,
        state: outcome.kind,
        outcome,
        expiresAt: outcome.completedAt + this.options.expiryMs,
      };
      const swapped = await this.redis.eval(
        COMPARE_AND_SET_SCRIPT,
        1,
        this.key(sourceId),
        existing.raw,
        JSON.stringify(record),
        this.options.expiryMs,
      );
      if (swapped !== 1) {
        this.log.warn({ sourceId }, 'Record changed before completion was written; ignored');
        return false;
      }
      return true;
    });
  }

  async release(sourceId: string, owner?: string): Promise<boolean> {
    return this.guard('release', async () => {
      const existing = await this.read(sourceId);
      if (!existing || !isReleasable(existing.record, owner)) return false;
      const removed = await this.redis.eval(COMPARE_AND_DELETE_SCRIPT, 1, this.key(sourceId), existing.raw);
      return removed === 1;
    });
  }

  /** Redis drops terminal records through their TTL */
  async expire(_before: number): Promise<number> {
    return 0;
  }

  async get(sourceId: string): Promise<IdempotencyRecord | null> {
    return this.guard('get', async () => (await this.read(sourceId))?.record ?? null);
  }

  private key(sourceId: string): string {
    return `${IDEMPOTENCY_PREFIX}${sourceId}`;
  }

  private async read(sourceId: string): Promise<StoredRecord | null> {
    const raw = await this.redis.get(this.key(sourceId));
    if (raw === null) return null;
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new StoreUnavailableError(`Corrupt idempotency record for ${sourceId}`);
    }
    return { raw, record: parsed };
  }

  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      this.log.error({ err, op }, 'Idempotency store operation failed');
      throw new StoreUnavailableError(`Idempotency store ${op} failed`, { cause: err });
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly records = new Map<string, IdempotencyRecord>();
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly options: IdempotencyStoreOptions) {
    this.now = options.now ?? Date.now;
    this.log = logger.child({ component: 'idempotency-store', backend: 'memory' });
  }

  // No await between the check and the write, so admission is atomic on the event loop
  async begin(sourceId: string, owner: string): Promise<BeginResult> {
    const now = this.now();
    const existing = this.records.get(sourceId);

    if (existing && !(existing.state === 'pending' && existing.leaseExpiresAt <= now)) {
      return toBeginResult(existing, owner);
    }
    if (existing) {
      this.log.warn({ sourceId, admittedAt: existing.admittedAt }, 'Pending lease lapsed; re-admitting');
    }

    this.records.set(sourceId, {
      sourceId,
      state: 'pending',
      admittedAt: now,
      leaseExpiresAt: now + this.options.pendingLeaseMs,
      owner,
    });
    return { status: 'admitted' };
  }

  async complete(sourceId: string, owner: string, outcome: ProcessingOutcome): Promise<boolean> {
    const existing = this.records.get(sourceId);
    if (!existing || existing.state !== 'pending' || existing.owner !== owner) {
      this.log.warn(
        { sourceId, state: existing?.state ?? 'missing', heldBy: existing?.owner },
        'Completion for a record this attempt does not hold; ignored',
      );
      return false;
    }
    this.records.set(sourceId, {
      ...existing,
      state: outcome.kind,
      outcome,
      expiresAt: outcome.completedAt + this.options.expiryMs,
    });
    return true;
  }

  async release(sourceId: string, owner?: string): Promise<boolean> {
    const existing = this.records.get(sourceId);
    if (!existing || !isReleasable(existing, owner)) return false;
    this.records.delete(sourceId);
    return true;
  }

  async expire(before: number): Promise<number> {
    let removed = 0;
    for (const [sourceId, record] of this.records) {
      if (record.state !== 'pending' && record.expiresAt !== undefined && record.expiresAt <= before) {
        this.records.delete(sourceId);
        removed++;
      }
    }
    return removed;
  }

  async get(sourceId: string): Promise<IdempotencyRecord | null> {
    const record = this.records.get(sourceId);
    return record ? { ...record } : null;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createIdempotencyStore(options: IdempotencyStoreOptions, redis?: Redis): IdempotencyStore {
  if (redis) {
    logger.info('Idempotency store: Redis-backed (SET NX PX)');
    return new RedisIdempotencyStore(redis, options);
  }
  logger.info('Idempotency store: In-memory');
  return new InMemoryIdempotencyStore(options);
}
