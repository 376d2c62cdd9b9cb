import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { Classification, InboundEvent, ParsedMessage, Turn } from '../config/types';
import { PipelineConfig } from '../config/config-service';
import { ParseResult } from '../ingestion/email-parser';
import { BeginResult, IdempotencyStore, ProcessingOutcome } from '../idempotency/types';
import { IntentClassifier } from '../classifier/intent-classifier';
import { TicketHandle, TicketResolutionEngine } from '../ticketing/resolution-engine';
import { ConversationMemory } from '../memory/types';
import { DispatchRouter } from '../handlers/dispatch-router';
import { ErrorQueue, EventProcessor, EventResult, FailureStage } from '../queue/types';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';
import { DuplicateDeliveryError, MalformedInputError, PipelineError, isTerminal } from '../resilience/errors';
import { eventLogger } from '../observability/logger';
import { TraceContext, createTraceContext, withSpan } from '../observability/trace';
import { duplicateDeliveries, eventDuration, eventsProcessed } from '../observability/metrics';

export interface OrchestratorDeps {
  idempotency: IdempotencyStore;
  classifier: IntentClassifier;
  engine: TicketResolutionEngine;
  memory: ConversationMemory;
  router: DispatchRouter;
  errorQueue: ErrorQueue;
  resilience: ResilienceWrapper;
}

export type OrchestratorOptions = Pick<PipelineConfig, 'contextMaxTurns'>;

interface EventScope {
  event: InboundEvent;
  /** Identifies this processing attempt to the idempotency store */
  owner: string;
  signal: AbortSignal;
  log: Logger;
  trace: TraceContext;
}

/**
 * Pipeline orchestrator — runs one admitted event end to end:
 * admission → parse check → context → classification → ticket resolution →
 * incoming turn → dispatch → completion.
 *
 * Every email ends draft_created, fallback_acknowledged or error_queued.
 * A cancelled event releases its admission instead.
 */
export class Orchestrator implements EventProcessor {
  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {}

  async process(event: InboundEvent, parsed: ParseResult, signal: AbortSignal): Promise<EventResult> {
    const trace = createTraceContext({ sourceId: event.sourceId });
    const log = eventLogger(trace.requestId, event.sourceId);
    const scope: EventScope = { event, owner: uuidv4(), signal, log, trace };
    const started = Date.now();

    // 1. Admission (fail closed). A retried begin carries the same owner, so a lost reply still admits.
    let admission: BeginResult;
    try {
      admission = await withSpan(trace, 'idempotency.begin', () =>
        this.deps.resilience.invoke('idempotency', () => this.deps.idempotency.begin(event.sourceId, scope.owner), {
          signal,
        }),
      );
    } catch (err) {
      if (signal.aborted) return this.finish(scope, started, { status: 'timed_out' });
      log.error({ err }, 'Idempotency admission unavailable; event not processed');
      return this.finish(scope, started, { status: 'rejected', reason: describe(err) });
    }

    if (admission.status === 'in_flight') {
      this.absorbDuplicate(scope, new DuplicateDeliveryError(event.sourceId, 'in_flight'));
      return this.finish(scope, started, { status: 'duplicate', state: 'in_flight' });
    }
    if (admission.status === 'completed') {
      this.absorbDuplicate(scope, new DuplicateDeliveryError(event.sourceId, 'completed'));
      return this.finish(scope, started, { status: 'duplicate', state: 'completed', outcome: admission.outcome });
    }

    try {
      const outcome = await this.run(scope, parsed);
      await this.complete(scope, outcome);
      return this.finish(scope, started, { status: 'processed', outcome });
    } catch (err) {
      if (signal.aborted) {
        log.warn({ err }, 'Processing ceiling exceeded; releasing admission');
        await this.release(scope);
        return this.finish(scope, started, { status: 'timed_out' });
      }
      return this.finish(scope, started, await this.failUnexpected(scope, err));
    }
  }

  private async run(scope: EventScope, parsed: ParseResult): Promise<ProcessingOutcome> {
    const { log, signal, trace } = scope;

    // 2. Malformed input never enters the pipeline
    if (!parsed.ok) {
      const malformed = new MalformedInputError(parsed.reason);
      log.warn({ err: malformed }, 'Malformed email payload');
      return this.queueFailure(scope, 'parse', malformed.message, malformed.code);
    }
    const message = parsed.message;

    // 3. Context of the referenced ticket (advisory)
    const history = await this.loadHistory(scope, message);

    // 4. Classification
    let classification: Classification | null = null;
    try {
      classification = await withSpan(trace, 'classify', () =>
        this.deps.resilience.invoke('classifier', (s) => this.deps.classifier.classify(message, history, s), {
          signal,
        }),
      );
      log.info({ intent: classification.intent, confidence: classification.confidence }, 'Email classified');
    } catch (err) {
      if (!isTerminal(err)) throw err;
      log.warn({ err }, 'Classification failed; taking the fallback path without a ticket');
    }

    // 5. Ticket resolution + incoming turn
    let handle: TicketHandle | null = null;
    if (classification) {
      const current = classification;
      try {
        handle = await withSpan(trace, 'ticket.resolve', () => this.deps.engine.resolve(message, current, signal));
        const resolved = handle;
        await this.deps.resilience.invoke(
          'memory',
          () => this.deps.memory.append(resolved.ticket.id, resolved.incomingTurn),
          { signal },
        );
      } catch (err) {
        if (!isTerminal(err)) throw err;
        log.error({ err }, 'Ticket resolution failed');
        return this.queueFailure(scope, 'resolution', describe(err), errorCode(err), handle?.ticket.id);
      }
    }
    if (handle) {
      trace.ticketId = handle.ticket.id;
      log.info({ ticketId: handle.ticket.id, decision: handle.decision.kind }, 'Ticket resolved');
    }

    // 6. Dispatch
    const ticketHistory = handle && handle.ticket.id === message.referenceToken ? history : [];
    try {
      const result = await withSpan(trace, 'dispatch', () =>
        this.deps.router.dispatch({
          message,
          handle,
          classification,
          history: ticketHistory,
          signal,
          log: handle ? log.child({ ticketId: handle.ticket.id }) : log,
        }),
      );
      return {
        kind: 'completed',
        disposition: result.disposition,
        ticketId: handle?.ticket.id,
        draftId: result.draftId,
        completedAt: Date.now(),
      };
    } catch (err) {
      if (!isTerminal(err)) throw err;
      log.error({ err }, 'Dispatch failed');
      return this.queueFailure(scope, 'dispatch', describe(err), errorCode(err), handle?.ticket.id);
    }
  }

  private async loadHistory(scope: EventScope, message: ParsedMessage): Promise<readonly Turn[]> {
    const token = message.referenceToken;
    if (!token) return [];
    try {
      return await this.deps.resilience.invoke(
        'memory',
        () => this.deps.memory.recentContext(token, this.options.contextMaxTurns),
        { signal: scope.signal },
      );
    } catch (err) {
      if (!isTerminal(err)) throw err;
      scope.log.warn({ err, ticketId: token }, 'Conversation context unavailable; classifying without it');
      return [];
    }
  }

  private async queueFailure(
    scope: EventScope,
    stage: FailureStage,
    reason: string,
    code: string,
    ticketId?: string,
  ): Promise<ProcessingOutcome> {
    const { event, signal } = scope;
    // Enqueue is not idempotent, so it gets one attempt
    const entry = await this.deps.resilience.invoke(
      'error_queue',
      () => this.deps.errorQueue.enqueue({ sourceId: event.sourceId, event, stage, reason, errorCode: code, ticketId }),
      { signal, retry: false },
    );
    scope.log.warn({ entryId: entry.id, stage }, 'Event sent to error queue');
    return { kind: 'failed_terminal', disposition: 'error_queued', ticketId, completedAt: Date.now() };
  }

  /** A bug or an unreachable error queue; record it if possible, otherwise leave it for re-delivery */
  private async failUnexpected(scope: EventScope, err: unknown): Promise<EventResult> {
    scope.log.error({ err }, 'Event processing failed');
    if (!isTerminal(err)) {
      try {
        const outcome = await this.queueFailure(scope, 'processing', describe(err), errorCode(err));
        await this.complete(scope, outcome);
        return { status: 'processed', outcome };
      } catch (queueErr) {
        scope.log.error({ err: queueErr }, 'Error queue unavailable');
      }
    }
    await this.release(scope);
    return { status: 'failed', reason: describe(err) };
  }

  private absorbDuplicate(scope: EventScope, duplicate: DuplicateDeliveryError): void {
    duplicateDeliveries.inc({ state: duplicate.state });
    scope.log.info({ code: duplicate.code }, duplicate.message);
  }

  private async complete(scope: EventScope, outcome: ProcessingOutcome): Promise<void> {
    const { event, log, owner } = scope;
    try {
      const recorded = await this.deps.resilience.invoke('idempotency', () =>
        this.deps.idempotency.complete(event.sourceId, owner, outcome),
      );
      if (!recorded) log.warn({ disposition: outcome.disposition }, 'Admission no longer held; completion not recorded');
    } catch (err) {
      // Side effects are done; the lease lapses and a re-delivery replays idempotently
      log.error({ err, disposition: outcome.disposition }, 'Failed to record completion');
    }
  }

  private async release(scope: EventScope): Promise<void> {
    try {
      await this.deps.resilience.invoke('idempotency', () =>
        this.deps.idempotency.release(scope.event.sourceId, scope.owner),
      );
    } catch (err) {
      scope.log.error({ err }, 'Failed to release admission; it frees up when the lease lapses');
    }
  }

  private finish(scope: EventScope, started: number, result: EventResult): EventResult {
    eventDuration.observe((Date.now() - started) / 1000);
    const label = result.status === 'processed' ? result.outcome.disposition : result.status;
    eventsProcessed.inc({ disposition: label });
    scope.log.info({ status: result.status, disposition: label, durationMs: Date.now() - started }, 'Event finished');
    return result;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorCode(err: unknown): string {
  return err instanceof PipelineError ? err.code : 'UNKNOWN';
}
