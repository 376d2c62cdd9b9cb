import Redis from 'ioredis';
import { ConversationMemory } from './types';
import { Turn } from '../config/types';
import { freezeTurn, isSameTurn, turnKey, validateTurn } from '../ticketing/turns';
import { StoreUnavailableError } from '../resilience/errors';
import { logger } from '../observability/logger';

const MEMORY_TTL = 30 * 24 * 60 * 60; // 30 days
const MAX_STORED_TURNS = 200;

// Dedup check, append, trim and TTL refresh in one round trip
const APPEND_SCRIPT = `
if redis.call('SADD', KEYS[2], ARGV[1]) == 0 then return 0 end
redis.call('RPUSH', KEYS[1], ARGV[2])
redis.call('LTRIM', KEYS[1], -tonumber(ARGV[3]), -1)
redis.call('EXPIRE', KEYS[1], ARGV[4])
redis.call('EXPIRE', KEYS[2], ARGV[4])
return 1
`;

/**
 * Redis-backed conversation memory: one list of turns per ticket plus a set of dedup keys.
 */
export class RedisConversationMemory implements ConversationMemory {
  private log = logger.child({ component: 'conversation-memory', backend: 'redis' });

  constructor(private readonly redis: Redis) {}

  private turnsKey(ticketId: string): string {
    return `mem:turns:${ticketId}`;
  }

  private seenKey(ticketId: string): string {
    return `mem:seen:${ticketId}`;
  }

  async append(ticketId: string, turn: Turn): Promise<void> {
    try {
      await this.redis.eval(
        APPEND_SCRIPT,
        2,
        this.turnsKey(ticketId),
        this.seenKey(ticketId),
        turnKey(turn),
        JSON.stringify(turn),
        MAX_STORED_TURNS,
        MEMORY_TTL,
      );
    } catch (err) {
      this.log.error({ err, ticketId }, 'Failed to append turn to Redis');
      throw new StoreUnavailableError(`Memory append failed for ticket ${ticketId}`, { cause: err });
    }
  }

  async recentContext(ticketId: string, maxTurns: number): Promise<Turn[]> {
    if (maxTurns <= 0) return [];
    let raw: string[];
    try {
      raw = await this.redis.lrange(this.turnsKey(ticketId), -maxTurns, -1);
    } catch (err) {
      this.log.error({ err, ticketId }, 'Failed to read turns from Redis');
      throw new StoreUnavailableError(`Memory read failed for ticket ${ticketId}`, { cause: err });
    }

    const turns: Turn[] = [];
    for (const entry of raw) {
      const parsed: unknown = JSON.parse(entry);
      if (validateTurn(parsed)) {
        turns.push(freezeTurn(parsed));
      } else {
        this.log.warn({ ticketId }, 'Skipping malformed turn in memory');
      }
    }
    return turns;
  }

  async clear(ticketId: string): Promise<void> {
    await this.redis.del(this.turnsKey(ticketId), this.seenKey(ticketId));
  }
}

/**
 * In-memory conversation memory (dev/test fallback).
 */
export class InMemoryConversationMemory implements ConversationMemory {
  private store: Map<string, Turn[]> = new Map();

  async append(ticketId: string, turn: Turn): Promise<void> {
    const turns = this.store.get(ticketId) ?? [];
    if (turns.some((t) => isSameTurn(t, turn))) return;
    turns.push(Object.isFrozen(turn) ? turn : freezeTurn(turn));
    if (turns.length > MAX_STORED_TURNS) turns.splice(0, turns.length - MAX_STORED_TURNS);
    this.store.set(ticketId, turns);
  }

  async recentContext(ticketId: string, maxTurns: number): Promise<Turn[]> {
    if (maxTurns <= 0) return [];
    return (this.store.get(ticketId) ?? []).slice(-maxTurns);
  }

  async clear(ticketId: string): Promise<void> {
    this.store.delete(ticketId);
  }
}

/**
 * Create the appropriate memory based on environment.
 */
export function createConversationMemory(redis?: Redis): ConversationMemory {
  if (redis) {
    return new RedisConversationMemory(redis);
  }
  logger.warn('Using in-memory conversation memory (no Redis)');
  return new InMemoryConversationMemory();
}
