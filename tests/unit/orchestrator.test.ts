import { Orchestrator } from '../../src/orchestrator/orchestrator';
import { WorkQueue } from '../../src/queue/work-queue';
import { InMemoryErrorQueue } from '../../src/queue/error-queue';
import { replayErrorEntry } from '../../src/queue/replay';
import { EventResult } from '../../src/queue/types';
import { InMemoryIdempotencyStore } from '../../src/idempotency/idempotency-store';
import { InMemoryTicketBackend } from '../../src/ticketing/in-memory-ticketing';
import { TicketResolutionEngine } from '../../src/ticketing/resolution-engine';
import { InMemoryConversationMemory } from '../../src/memory/conversation-memory';
import { InMemoryDraftStore } from '../../src/drafts/draft-store';
import { LogNotifier } from '../../src/escalation/notifier';
import { InMemoryReportGenerator } from '../../src/reports/report-generator';
import { DispatchRouter } from '../../src/handlers/dispatch-router';
import { FallbackHandler } from '../../src/handlers/fallback-handler';
import { BankStatementHandler } from '../../src/handlers/bank-statement-handler';
import { PasswordUpdateHandler } from '../../src/handlers/password-update-handler';
import { GeneralQueryHandler } from '../../src/handlers/general-query-handler';
import { IntentClassifier } from '../../src/classifier/intent-classifier';
import { parseEmailPayload } from '../../src/ingestion/email-parser';
import { Classification, InboundEvent } from '../../src/config/types';
import { StoreUnavailableError } from '../../src/resilience/errors';
import { DependencyName, DependencyPolicy } from '../../src/resilience/types';
import { BeginResult } from '../../src/idempotency/types';
import {
  FakeClock,
  StubClassifier,
  StubKnowledge,
  buildResilience,
  flushPromises,
  makeClassification,
  testPolicy,
} from '../support/fakes';

const DEFAULT_PAYLOAD = {
  from: 'Alex <alex@example.com>',
  subject: 'Question about my account',
  body: 'How do I update my mailing address?',
};

function emailEvent(sourceId: string, rawPayload: unknown = DEFAULT_PAYLOAD): InboundEvent {
  return { sourceId, rawPayload, receivedAt: Date.UTC(2024, 4, 15, 9, 30) };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

async function completionOf(queue: WorkQueue, event: InboundEvent): Promise<EventResult> {
  const receipt = queue.submit(event);
  if (!receipt.accepted) throw new Error(`submit refused: ${receipt.reason}`);
  return receipt.completion;
}

describe('Orchestrator', () => {
  let idempotency: InMemoryIdempotencyStore;
  let tickets: InMemoryTicketBackend;
  let memory: InMemoryConversationMemory;
  let drafts: InMemoryDraftStore;
  let notifier: LogNotifier;
  let errorQueue: InMemoryErrorQueue;
  let router: DispatchRouter;
  let orchestrator: Orchestrator;
  let queue: WorkQueue;

  function build(
    classifier: IntentClassifier,
    processingCeilingMs = 5_000,
    overrides: Partial<Record<DependencyName, DependencyPolicy>> = {},
  ): void {
    const resilience = buildResilience(
      new FakeClock(),
      testPolicy({ retry: { maxAttempts: 2, baseDelayMs: 100, maxDelayMs: 1_000 } }),
      overrides,
    );
    idempotency = new InMemoryIdempotencyStore({ expiryMs: 60_000, pendingLeaseMs: 60_000 });
    tickets = new InMemoryTicketBackend();
    memory = new InMemoryConversationMemory();
    drafts = new InMemoryDraftStore();
    notifier = new LogNotifier();
    errorQueue = new InMemoryErrorQueue();

    router = new DispatchRouter(
      {
        handlers: [
          new BankStatementHandler(new InMemoryReportGenerator(), resilience),
          new PasswordUpdateHandler(notifier, resilience, { passwordResetUrl: 'https://accounts.example.com/reset' }),
          new GeneralQueryHandler(
            new StubKnowledge([{ type: 'faq', content: 'Q: Address?\nA: Profile page.', score: 1, source: 'faq/account' }]),
            resilience,
            { resultLimit: 3 },
          ),
        ],
        fallback: new FallbackHandler(notifier, resilience),
        drafts,
        memory,
        tickets,
        resilience,
      },
      { minConfidence: 0.6, lowConfidencePolicy: 'fallback' },
    );
    const engine = new TicketResolutionEngine(tickets, resilience, { closedTicketPolicy: 'fork' });
    orchestrator = new Orchestrator(
      { idempotency, classifier, engine, memory, router, errorQueue, resilience },
      { contextMaxTurns: 10 },
    );
    queue = new WorkQueue(orchestrator, { workerPoolSize: 4, perTicketLaneCapacity: 10, processingCeilingMs });
  }

  describe('happy path', () => {
    it('should open a ticket, draft a reply and record the outcome', async () => {
      build(new StubClassifier(makeClassification('general_query')));

      const result = await completionOf(queue, emailEvent('msg-1'));

      expect(result).toMatchObject({
        status: 'processed',
        outcome: { kind: 'completed', disposition: 'draft_created', ticketId: '1000' },
      });
      const [draft] = await drafts.list();
      expect(result.status === 'processed' && result.outcome.draftId).toBe(draft.id);
      expect((await memory.recentContext('1000', 10)).map((t) => t.direction)).toEqual(['incoming', 'outgoing']);
      expect(await idempotency.get('msg-1')).toMatchObject({ state: 'completed' });
    });

    it('should continue the referenced ticket and classify with its history', async () => {
      const classifier = new StubClassifier(makeClassification('general_query'));
      build(classifier);
      await completionOf(queue, emailEvent('msg-1'));

      const reply = emailEvent('msg-2', { from: 'alex@example.com', subject: 'Re: Question [TICKET-1000]', body: 'Thanks, one more thing' });
      const result = await completionOf(queue, reply);

      expect(result).toMatchObject({ status: 'processed', outcome: { ticketId: '1000' } });
      expect(classifier.calls[1].context.map((t) => t.messageId)).toEqual(['msg-1', 'msg-1']);
      expect(tickets.getAllTickets()).toHaveLength(1);
    });

    it('should record turns of one ticket in arrival order even when the first is slow', async () => {
      let openGate: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => (openGate = resolve));
      const classified: string[] = [];
      build({
        classify: async (message) => {
          classified.push(message.sourceId);
          if (message.sourceId === 'msg-2') await gate;
          return makeClassification('general_query');
        },
      });
      await completionOf(queue, emailEvent('msg-1'));

      const followUp = (sourceId: string, body: string) =>
        emailEvent(sourceId, { from: 'alex@example.com', subject: 'Re: Question [TICKET-1000]', body });
      const second = completionOf(queue, followUp('msg-2', 'First follow-up'));
      const third = completionOf(queue, followUp('msg-3', 'Second follow-up'));
      await flushPromises();
      expect(classified).toEqual(['msg-1', 'msg-2']);

      openGate();
      await Promise.all([second, third]);

      const turns = await memory.recentContext('1000', 10);
      expect(turns.map((t) => `${t.direction}:${t.messageId}`)).toEqual([
        'incoming:msg-1',
        'outgoing:msg-1',
        'incoming:msg-2',
        'outgoing:msg-2',
        'incoming:msg-3',
        'outgoing:msg-3',
      ]);
    });
  });

  describe('idempotency', () => {
    it('should process a message once however often it is delivered', async () => {
      const classifier = new StubClassifier(makeClassification('general_query'));
      build(classifier);

      const results = await Promise.all(Array.from({ length: 5 }, () => completionOf(queue, emailEvent('msg-1'))));

      const processed = results.filter((r) => r.status === 'processed');
      const duplicates = results.filter((r) => r.status === 'duplicate');
      expect(processed).toHaveLength(1);
      expect(duplicates).toHaveLength(4);
      for (const dup of duplicates) {
        expect(dup).toMatchObject({ state: 'completed', outcome: { disposition: 'draft_created', ticketId: '1000' } });
      }
      expect(classifier.calls).toHaveLength(1);
      expect(await drafts.list()).toHaveLength(1);
    });

    it('should absorb a delivery that arrives while the original is still in flight', async () => {
      let finish: () => void = () => undefined;
      const classifier: IntentClassifier = {
        classify: () =>
          new Promise<Classification>((resolve) => {
            finish = () => resolve(makeClassification('general_query'));
          }),
      };
      build(classifier);
      const event = emailEvent('msg-1');
      const signal = new AbortController().signal;

      const first = orchestrator.process(event, parseEmailPayload(event), signal);
      await flushPromises();
      const second = await orchestrator.process(event, parseEmailPayload(event), signal);
      finish();

      expect(second).toEqual({ status: 'duplicate', state: 'in_flight' });
      await expect(first).resolves.toMatchObject({ status: 'processed' });
    });

    it('should process an event whose first admission reply arrived after the deadline', async () => {
      const classifier = new StubClassifier(makeClassification('general_query'));
      build(classifier, 5_000, { idempotency: testPolicy({ timeoutMs: 20 }) });
      const realBegin = idempotency.begin.bind(idempotency);
      let deliverLateReply: () => void = () => undefined;
      const begin = jest.spyOn(idempotency, 'begin').mockImplementationOnce(async (sourceId, owner): Promise<BeginResult> => {
        const result = await realBegin(sourceId, owner);
        await new Promise<void>((resolve) => (deliverLateReply = resolve));
        return result;
      });

      const result = await completionOf(queue, emailEvent('msg-1'));
      deliverLateReply();

      expect(result).toMatchObject({ status: 'processed', outcome: { disposition: 'draft_created' } });
      expect(begin).toHaveBeenCalledTimes(2);
      expect(begin.mock.calls[1][1]).toBe(begin.mock.calls[0][1]);
      expect(classifier.calls).toHaveLength(1);
      expect(await drafts.list()).toHaveLength(1);
      expect(await idempotency.get('msg-1')).toMatchObject({ state: 'completed' });
    });

    it('should reject the event when admission cannot be checked', async () => {
      build(new StubClassifier(makeClassification('general_query')));
      jest.spyOn(idempotency, 'begin').mockRejectedValue(new StoreUnavailableError('redis down'));

      expect(await completionOf(queue, emailEvent('msg-1'))).toEqual({
        status: 'rejected',
        reason: 'idempotency failed after 2 attempt(s): redis down',
      });
    });
  });

  describe('degraded paths', () => {
    it('should acknowledge and escalate when the classifier is down', async () => {
      const classifier = new StubClassifier(httpError(503, 'model overloaded'));
      build(classifier);

      const result = await completionOf(queue, emailEvent('msg-1'));

      expect(result).toMatchObject({ status: 'processed', outcome: { kind: 'completed', disposition: 'fallback_acknowledged' } });
      expect(result.status === 'processed' && result.outcome.ticketId).toBeUndefined();
      expect(classifier.calls).toHaveLength(2);
      expect(tickets.getAllTickets()).toHaveLength(0);
      expect(notifier.getSent()[0]).toMatchObject({ team: 'escalations' });
      expect(notifier.getSent()[0].body).toContain('Reason: classification unavailable');
    });

    it('should queue malformed payloads without classifying them', async () => {
      const classifier = new StubClassifier(makeClassification('general_query'));
      build(classifier);

      const result = await completionOf(queue, emailEvent('msg-1', '{not json'));

      expect(result).toMatchObject({ status: 'processed', outcome: { kind: 'failed_terminal', disposition: 'error_queued' } });
      const [entry] = await errorQueue.list();
      expect(entry).toMatchObject({ sourceId: 'msg-1', stage: 'parse', reason: 'payload is not valid JSON', errorCode: 'MALFORMED_INPUT' });
      expect(classifier.calls).toHaveLength(0);
      expect(await idempotency.get('msg-1')).toMatchObject({ state: 'failed_terminal' });
    });

    it('should queue a dispatch failure and process it on replay', async () => {
      build(new StubClassifier(makeClassification('urgent_human')));
      const notify = jest.spyOn(notifier, 'notify').mockRejectedValue(httpError(503, 'webhook down'));

      const failed = await completionOf(queue, emailEvent('msg-1'));
      expect(failed).toMatchObject({
        status: 'processed',
        outcome: { kind: 'failed_terminal', disposition: 'error_queued', ticketId: '1000' },
      });
      const [entry] = await errorQueue.list();
      expect(entry).toMatchObject({
        stage: 'dispatch',
        errorCode: 'TRANSIENT_DEPENDENCY',
        reason: 'notifications failed after 2 attempt(s): webhook down',
        ticketId: '1000',
      });

      notify.mockRestore();
      const replay = await replayErrorEntry(entry.id, { errorQueue, idempotency, queue });
      if (replay.status !== 'resubmitted') throw new Error(`replay ${replay.status}`);

      expect(await replay.completion).toMatchObject({
        status: 'processed',
        outcome: { disposition: 'fallback_acknowledged', ticketId: '1000' },
      });
      expect(await errorQueue.size()).toBe(0);
      expect(tickets.getAllTickets()).toHaveLength(1);
      expect(notifier.getSent()).toHaveLength(1);
    });

    it('should queue an unexpected processing error', async () => {
      build(new StubClassifier(makeClassification('general_query')));
      jest.spyOn(router, 'dispatch').mockRejectedValue(new TypeError('boom'));

      const result = await completionOf(queue, emailEvent('msg-1'));

      expect(result).toMatchObject({ status: 'processed', outcome: { disposition: 'error_queued' } });
      expect((await errorQueue.list())[0]).toMatchObject({ stage: 'processing', reason: 'boom', errorCode: 'UNKNOWN' });
    });

    it('should release the admission when even the error queue is unreachable', async () => {
      build(new StubClassifier(makeClassification('general_query')));
      jest.spyOn(router, 'dispatch').mockRejectedValue(new TypeError('boom'));
      jest.spyOn(errorQueue, 'enqueue').mockRejectedValue(new Error('disk full'));

      expect(await completionOf(queue, emailEvent('msg-1'))).toEqual({ status: 'failed', reason: 'boom' });
      expect(await idempotency.get('msg-1')).toBeNull();
    });
  });

  describe('processing ceiling', () => {
    it('should release the admission on timeout so a re-delivery can succeed', async () => {
      let hang = true;
      const classifier: IntentClassifier = {
        classify: (_message, _context, signal) =>
          hang
            ? new Promise<Classification>((_, reject) => signal?.addEventListener('abort', () => reject(signal?.reason)))
            : Promise.resolve(makeClassification('general_query')),
      };
      build(classifier, 20);

      expect(await completionOf(queue, emailEvent('msg-1'))).toEqual({ status: 'timed_out' });
      expect(await idempotency.get('msg-1')).toBeNull();

      hang = false;
      expect(await completionOf(queue, emailEvent('msg-1'))).toMatchObject({
        status: 'processed',
        outcome: { disposition: 'draft_created' },
      });
    });
  });
});

describe('WorkQueue', () => {
  function event(sourceId: string, subject = 'Hello'): InboundEvent {
    return { sourceId, rawPayload: { from: 'sam@example.com', subject }, receivedAt: 0 };
  }

  it('should serialize messages for the same ticket', async () => {
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => (release = resolve));
    const queue = new WorkQueue(
      {
        process: async (e) => {
          order.push(`start ${e.sourceId}`);
          if (e.sourceId === 'a') await gate;
          order.push(`end ${e.sourceId}`);
          return { status: 'timed_out' };
        },
      },
      { workerPoolSize: 4, perTicketLaneCapacity: 5, processingCeilingMs: 5_000 },
    );

    const a = queue.submit(event('a', 'Re: [TICKET-5]'));
    const b = queue.submit(event('b', 'Re: [TICKET-5] again'));
    expect(a).toMatchObject({ accepted: true, laneKey: 'ticket:5' });
    expect(b).toMatchObject({ accepted: true, laneKey: 'ticket:5' });
    expect(order).toEqual(['start a']);

    release();
    await queue.onIdle();
    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('should refuse an event when its lane is full', async () => {
    const queue = new WorkQueue(
      {
        process: (_e, _parsed, signal) =>
          new Promise<EventResult>((resolve) => signal.addEventListener('abort', () => resolve({ status: 'timed_out' }))),
      },
      { workerPoolSize: 1, perTicketLaneCapacity: 1, processingCeilingMs: 20 },
    );

    queue.submit(event('a', 'Re: [TICKET-5]'));
    expect(queue.submit(event('b', 'Re: [TICKET-5]'))).toEqual({ accepted: false, laneKey: 'ticket:5', reason: 'lane_full' });
    await queue.onIdle();
  });

  it('should abort the processor signal at the processing ceiling', async () => {
    let seen: unknown;
    const queue = new WorkQueue(
      {
        process: (_e, _parsed, signal) =>
          new Promise<EventResult>((resolve) =>
            signal.addEventListener('abort', () => {
              seen = signal.reason;
              resolve({ status: 'timed_out' });
            }),
          ),
      },
      { workerPoolSize: 1, perTicketLaneCapacity: 1, processingCeilingMs: 10 },
    );

    const receipt = queue.submit(event('a'));
    if (!receipt.accepted) throw new Error('refused');
    await expect(receipt.completion).resolves.toEqual({ status: 'timed_out' });
    expect(seen).toMatchObject({ code: 'PROCESSING_TIMEOUT', message: 'Processing of a exceeded 10ms' });
  });

  it('should turn a throwing processor into a failed result', async () => {
    const queue = new WorkQueue(
      {
        process: async () => {
          throw new Error('processor crashed');
        },
      },
      { workerPoolSize: 1, perTicketLaneCapacity: 1, processingCeilingMs: 5_000 },
    );

    const receipt = queue.submit(event('a'));
    if (!receipt.accepted) throw new Error('refused');
    await expect(receipt.completion).resolves.toEqual({ status: 'failed', reason: 'processor crashed' });
  });

  it('should stop accepting on close and wait for admitted work', async () => {
    let finished = false;
    const queue = new WorkQueue(
      {
        process: async () => {
          await new Promise((resolve) => setTimeout(resolve, 5));
          finished = true;
          return { status: 'timed_out' };
        },
      },
      { workerPoolSize: 1, perTicketLaneCapacity: 1, processingCeilingMs: 5_000 },
    );

    queue.submit(event('a'));
    await queue.close();

    expect(finished).toBe(true);
    expect(queue.submit(event('b'))).toEqual({ accepted: false, reason: 'closed' });
    expect(queue.stats()).toEqual({ active: 0, queued: 0, lanes: 0, closed: true });
  });
});
