import { InboundEvent } from '../config/types';
import { ParseResult, parseEmailPayload } from '../ingestion/email-parser';
import { EventProcessor, EventResult, SubmitReceipt, WorkQueueStats } from './types';
import { LaneScheduler } from './lane-scheduler';
import { LaneFullError, ProcessingTimeoutError } from '../resilience/errors';
import { logger } from '../observability/logger';
import { eventsSubmitted } from '../observability/metrics';

export interface WorkQueueOptions {
  workerPoolSize: number;
  perTicketLaneCapacity: number;
  processingCeilingMs: number;
}

/** Messages referencing a ticket share its lane; everything else runs alone */
export function laneKeyFor(event: InboundEvent, parsed: ParseResult): string {
  if (parsed.ok && parsed.message.referenceToken) return `ticket:${parsed.message.referenceToken}`;
  return `message:${event.sourceId}`;
}

/**
 * Work Queue — admits events into per-ticket lanes and runs them on a bounded pool.
 *
 * `submit` answers immediately. The completion promise always resolves, with
 * failures carried in the EventResult.
 */
export class WorkQueue {
  private readonly scheduler: LaneScheduler;
  private closed = false;
  private log = logger.child({ component: 'work-queue' });

  constructor(
    private readonly processor: EventProcessor,
    private readonly options: WorkQueueOptions,
    private readonly parse: (event: InboundEvent) => ParseResult = parseEmailPayload,
  ) {
    this.scheduler = new LaneScheduler(options.workerPoolSize, options.perTicketLaneCapacity);
  }

  submit(event: InboundEvent): SubmitReceipt {
    if (this.closed) {
      eventsSubmitted.inc({ accepted: 'false' });
      return { accepted: false, reason: 'closed' };
    }

    const parsed = this.parse(event);
    const laneKey = laneKeyFor(event, parsed);

    let completion: Promise<EventResult>;
    try {
      completion = this.scheduler.schedule(laneKey, () => this.run(event, parsed));
    } catch (err) {
      if (!(err instanceof LaneFullError)) throw err;
      this.log.warn({ sourceId: event.sourceId, laneKey, capacity: err.capacity }, 'Lane full; event refused');
      eventsSubmitted.inc({ accepted: 'false' });
      return { accepted: false, laneKey, reason: 'lane_full' };
    }

    eventsSubmitted.inc({ accepted: 'true' });
    return { accepted: true, laneKey, completion };
  }

  stats(): WorkQueueStats {
    return { ...this.scheduler.stats(), closed: this.closed };
  }

  onIdle(): Promise<void> {
    return this.scheduler.onIdle();
  }

  /** Stop accepting and wait for everything already admitted */
  async close(): Promise<void> {
    this.closed = true;
    await this.scheduler.onIdle();
  }

  private async run(event: InboundEvent, parsed: ParseResult): Promise<EventResult> {
    const { processingCeilingMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new ProcessingTimeoutError(event.sourceId, processingCeilingMs)),
      processingCeilingMs,
    );

    try {
      return await this.processor.process(event, parsed, controller.signal);
    } catch (err) {
      this.log.error({ err, sourceId: event.sourceId }, 'Event processor threw');
      return { status: 'failed', reason: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}
