import { InboundEvent } from '../config/types';
import { ProcessingOutcome } from '../idempotency/types';
import { ParseResult } from '../ingestion/email-parser';

export type FailureStage = 'parse' | 'classification' | 'resolution' | 'dispatch' | 'processing';

/** Event that could not be processed, kept for inspection and manual replay */
export interface ErrorQueueEntry {
  id: string;
  sourceId: string;
  event: InboundEvent;
  stage: FailureStage;
  reason: string;
  errorCode: string;
  ticketId?: string;
  enqueuedAt: number;
}

export type NewErrorQueueEntry = Omit<ErrorQueueEntry, 'id' | 'enqueuedAt'>;

export interface ErrorQueue {
  enqueue(entry: NewErrorQueueEntry, signal?: AbortSignal): Promise<ErrorQueueEntry>;
  /** Oldest first */
  list(limit?: number): Promise<ErrorQueueEntry[]>;
  /** Remove and return an entry, e.g. for replay */
  take(id: string): Promise<ErrorQueueEntry | null>;
  size(): Promise<number>;
}

// ───── Work Queue ───────────────────────────────────────────────

/** Final result of one event, as seen by whoever submitted it */
export type EventResult =
  | { status: 'processed'; outcome: ProcessingOutcome }
  | { status: 'duplicate'; state: 'in_flight' }
  | { status: 'duplicate'; state: 'completed'; outcome: ProcessingOutcome }
  | { status: 'timed_out' }
  /** Admission could not be checked; nothing ran */
  | { status: 'rejected'; reason: string }
  /** Could not be processed nor recorded; the record was released for re-delivery */
  | { status: 'failed'; reason: string };

export interface EventProcessor {
  process(event: InboundEvent, parsed: ParseResult, signal: AbortSignal): Promise<EventResult>;
}

export type SubmitReceipt =
  | { accepted: true; laneKey: string; completion: Promise<EventResult> }
  | { accepted: false; laneKey?: string; reason: 'lane_full' | 'closed' };

export interface WorkQueueStats {
  active: number;
  queued: number;
  lanes: number;
  closed: boolean;
}
