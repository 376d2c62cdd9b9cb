import { IdempotencyStore } from '../idempotency/types';
import { ErrorQueue, EventResult } from './types';
import { WorkQueue } from './work-queue';
import { logger } from '../observability/logger';

export type ReplayResult =
  | { status: 'not_found' }
  | { status: 'resubmitted'; laneKey: string; completion: Promise<EventResult> }
  | { status: 'refused'; reason: 'lane_full' | 'closed' };

export interface ReplayDeps {
  errorQueue: ErrorQueue;
  idempotency: IdempotencyStore;
  queue: WorkQueue;
}

/**
 * Manual replay of an error-queue entry: take it off the queue, release its
 * admission so the source id can be processed again, and resubmit the original event.
 * A refused resubmission puts the entry back.
 */
export async function replayErrorEntry(id: string, deps: ReplayDeps): Promise<ReplayResult> {
  const entry = await deps.errorQueue.take(id);
  if (!entry) return { status: 'not_found' };

  const log = logger.child({ component: 'replay', entryId: id, sourceId: entry.sourceId });
  const released = await deps.idempotency.release(entry.sourceId);
  log.info({ released }, 'Replaying error-queue entry');

  const receipt = deps.queue.submit(entry.event);
  if (!receipt.accepted) {
    await deps.errorQueue.enqueue({
      sourceId: entry.sourceId,
      event: entry.event,
      stage: entry.stage,
      reason: entry.reason,
      errorCode: entry.errorCode,
      ticketId: entry.ticketId,
    });
    log.warn({ reason: receipt.reason }, 'Replay refused; entry restored');
    return { status: 'refused', reason: receipt.reason };
  }
  return { status: 'resubmitted', laneKey: receipt.laneKey, completion: receipt.completion };
}

export interface ReplaySummary {
  resubmitted: number;
  refused: number;
}

/**
 * Replays the oldest `limit` entries in order. Works on a snapshot, so
 * entries that fail again and return to the queue are not replayed twice.
 */
export async function replayAllErrorEntries(deps: ReplayDeps, limit: number): Promise<ReplaySummary> {
  const entries = await deps.errorQueue.list(limit);
  const summary: ReplaySummary = { resubmitted: 0, refused: 0 };
  for (const entry of entries) {
    const result = await replayErrorEntry(entry.id, deps);
    if (result.status === 'resubmitted') summary.resubmitted++;
    if (result.status === 'refused') summary.refused++;
  }
  logger.info({ ...summary, component: 'replay' }, 'Error queue replayed');
  return summary;
}
