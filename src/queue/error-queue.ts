/**
 * Error Queue
 *
 * Terminal failures land here with the original event, so they can be
 * inspected and replayed from the admin API.
 */

import Redis from 'ioredis';
import Ajv from 'ajv';
import { v4 as uuidv4 } from 'uuid';
import { ErrorQueue, ErrorQueueEntry, NewErrorQueueEntry } from './types';
import { StoreUnavailableError } from '../resilience/errors';
import { logger } from '../observability/logger';

const ENTRIES_KEY = 'errq:entries';
const ORDER_KEY = 'errq:order';
const DEFAULT_LIST_LIMIT = 100;

const ajv = new Ajv();
const validateEntry = ajv.compile<ErrorQueueEntry>({
  type: 'object',
  required: ['id', 'sourceId', 'event', 'stage', 'reason', 'errorCode', 'enqueuedAt'],
  properties: {
    id: { type: 'string' },
    sourceId: { type: 'string' },
    event: {
      type: 'object',
      required: ['sourceId', 'receivedAt'],
      properties: { sourceId: { type: 'string' }, receivedAt: { type: 'number' } },
    },
    stage: { enum: ['parse', 'classification', 'resolution', 'dispatch', 'processing'] },
    reason: { type: 'string' },
    errorCode: { type: 'string' },
    ticketId: { type: 'string' },
    enqueuedAt: { type: 'number' },
  },
});

function build(entry: NewErrorQueueEntry): ErrorQueueEntry {
  return { ...entry, id: uuidv4(), enqueuedAt: Date.now() };
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisErrorQueue implements ErrorQueue {
  private log = logger.child({ component: 'error-queue', backend: 'redis' });

  constructor(private readonly redis: Redis) {}

  async enqueue(entry: NewErrorQueueEntry): Promise<ErrorQueueEntry> {
    const full = build(entry);
    try {
      await this.redis.multi().hset(ENTRIES_KEY, full.id, JSON.stringify(full)).rpush(ORDER_KEY, full.id).exec();
    } catch (err) {
      throw new StoreUnavailableError('Error queue enqueue failed', { cause: err });
    }
    this.log.warn({ id: full.id, sourceId: full.sourceId, stage: full.stage, errorCode: full.errorCode }, 'Event sent to error queue');
    return full;
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<ErrorQueueEntry[]> {
    const ids = await this.redis.lrange(ORDER_KEY, 0, limit - 1);
    if (ids.length === 0) return [];
    const raw = await this.redis.hmget(ENTRIES_KEY, ...ids);
    const entries: ErrorQueueEntry[] = [];
    for (const value of raw) {
      const entry = value === null ? null : this.parse(value);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async take(id: string): Promise<ErrorQueueEntry | null> {
    const value = await this.redis.hget(ENTRIES_KEY, id);
    if (value === null) return null;
    const removed = await this.redis.hdel(ENTRIES_KEY, id);
    // Another caller took it first
    if (removed === 0) return null;
    await this.redis.lrem(ORDER_KEY, 0, id);
    return this.parse(value);
  }

  async size(): Promise<number> {
    return this.redis.llen(ORDER_KEY);
  }

  private parse(value: string): ErrorQueueEntry | null {
    const data: unknown = JSON.parse(value);
    if (validateEntry(data)) return data;
    this.log.warn('Skipping malformed error queue entry');
    return null;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryErrorQueue implements ErrorQueue {
  private entries: Map<string, ErrorQueueEntry> = new Map();
  private log = logger.child({ component: 'error-queue', backend: 'memory' });

  async enqueue(entry: NewErrorQueueEntry): Promise<ErrorQueueEntry> {
    const full = build(entry);
    this.entries.set(full.id, full);
    this.log.warn({ id: full.id, sourceId: full.sourceId, stage: full.stage, errorCode: full.errorCode }, 'Event sent to error queue');
    return full;
  }

  async list(limit: number = DEFAULT_LIST_LIMIT): Promise<ErrorQueueEntry[]> {
    return Array.from(this.entries.values()).slice(0, limit);
  }

  async take(id: string): Promise<ErrorQueueEntry | null> {
    const entry = this.entries.get(id);
    if (!entry) return null;
    this.entries.delete(id);
    return entry;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createErrorQueue(redis?: Redis): ErrorQueue {
  if (redis) {
    logger.info('Error queue: Redis-backed');
    return new RedisErrorQueue(redis);
  }
  logger.info('Error queue: In-memory');
  return new InMemoryErrorQueue();
}
