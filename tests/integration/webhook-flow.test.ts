import { buildApp, AppContext } from '../../src/app';
import { buildPipelineConfig } from '../../src/config/config-service';
import { InMemoryTicketBackend } from '../../src/ticketing/in-memory-ticketing';
import { LogNotifier } from '../../src/escalation/notifier';
import { FakeClock, StubClassifier, StubKnowledge, makeClassification } from '../support/fakes';

const ADMIN_KEY = 'test-admin-key';

const email = {
  from: 'Alex Doe <alex@example.com>',
  subject: 'Question about my account',
  body: 'How do I update my mailing address?',
};

describe('Webhook Integration Flow', () => {
  let ctx: AppContext;
  let classifier: StubClassifier;

  beforeEach(async () => {
    classifier = new StubClassifier(makeClassification('general_query'));
    ctx = await buildApp({
      redis: null,
      config: buildPipelineConfig({ workerPoolSize: 2, processingCeilingMs: 5_000 }),
      clock: new FakeClock(),
      classifier,
      composer: null,
      knowledge: new StubKnowledge([
        { type: 'faq', content: 'Q: Address\nA: Open Profile and edit the address.', score: 1, source: 'faq/account' },
      ]),
      tickets: new InMemoryTicketBackend(),
      notifier: new LogNotifier(),
      adminApiKey: ADMIN_KEY,
    });
    await ctx.app.ready();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  function deliver(sourceId: string, rawPayload: unknown, wait = false) {
    return ctx.app.inject({
      method: 'POST',
      url: wait ? '/webhooks/email?wait=true' : '/webhooks/email',
      payload: { sourceId, rawPayload, receivedAt: 1_715_765_400_000 },
    });
  }

  function admin(method: 'GET' | 'POST' | 'PATCH' | 'DELETE', url: string, payload?: object) {
    return ctx.app.inject({ method, url, payload, headers: { 'x-admin-key': ADMIN_KEY } });
  }

  describe('POST /webhooks/email', () => {
    it('should accept an event and return 202', async () => {
      const res = await deliver('msg-1', email);

      expect(res.statusCode).toBe(202);
      expect(res.json()).toEqual({ status: 'accepted', sourceId: 'msg-1', laneKey: 'message:msg-1' });

      await ctx.queue.onIdle();
      expect(await ctx.pipeline.drafts.list()).toHaveLength(1);
    });

    it('should return the processing result when asked to wait', async () => {
      const res = await deliver('msg-1', email, true);

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        sourceId: 'msg-1',
        laneKey: 'message:msg-1',
        result: { status: 'processed', outcome: { kind: 'completed', disposition: 'draft_created', ticketId: '1000' } },
      });
    });

    it('should absorb a redelivery of the same message', async () => {
      await deliver('msg-1', email, true);
      const res = await deliver('msg-1', email, true);

      expect(res.json()).toMatchObject({ result: { status: 'duplicate', state: 'completed', outcome: { ticketId: '1000' } } });
      expect(classifier.calls).toHaveLength(1);
      expect(await ctx.pipeline.drafts.list()).toHaveLength(1);
    });

    it('should route a reply to its ticket lane', async () => {
      await deliver('msg-1', email, true);
      const res = await deliver('msg-2', { ...email, subject: 'Re: Question about my account [TICKET-1000]' });

      expect(res.json()).toMatchObject({ laneKey: 'ticket:1000' });
    });

    it('should reject a body without a payload', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/webhooks/email', payload: { sourceId: 'msg-1' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "body must have required property 'rawPayload'" });
    });

    it('should refuse events once the queue is closing', async () => {
      await ctx.queue.close();
      const res = await deliver('msg-1', email);

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ error: 'Shutting down' });
    });
  });

  describe('Admin API', () => {
    it('should reject requests without the admin key', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/admin/error-queue' });
      expect(res.statusCode).toBe(403);

      const wrong = await ctx.app.inject({ method: 'GET', url: '/admin/queue', headers: { 'x-admin-key': 'nope' } });
      expect(wrong.statusCode).toBe(403);
    });

    it('should list and replay error-queue entries', async () => {
      await deliver('msg-1', '{not json', true);

      const listed = await admin('GET', '/admin/error-queue');
      expect(listed.statusCode).toBe(200);
      const body = listed.json();
      expect(body.size).toBe(1);
      expect(body.entries[0]).toMatchObject({ sourceId: 'msg-1', stage: 'parse', errorCode: 'MALFORMED_INPUT' });

      const replayed = await admin('POST', `/admin/error-queue/${body.entries[0].id}/replay`);
      expect(replayed.statusCode).toBe(202);
      expect(replayed.json()).toEqual({ status: 'resubmitted', laneKey: 'message:msg-1' });

      // Still malformed, so it lands back on the queue
      await ctx.queue.onIdle();
      expect(await ctx.pipeline.errorQueue.size()).toBe(1);
    });

    it('should replay the whole error queue on demand', async () => {
      await deliver('msg-1', '{not json', true);
      await deliver('msg-2', '{not json', true);

      const res = await admin('POST', '/admin/error-queue/replay');
      expect(res.statusCode).toBe(202);
      expect(res.json()).toEqual({ resubmitted: 2, refused: 0 });

      await ctx.queue.onIdle();
      expect((await ctx.pipeline.errorQueue.list()).map((e) => e.sourceId).sort()).toEqual(['msg-1', 'msg-2']);
    });

    it('should return 404 when replaying an unknown entry', async () => {
      const res = await admin('POST', '/admin/error-queue/missing/replay');
      expect(res.statusCode).toBe(404);
    });

    it('should expose idempotency records', async () => {
      await deliver('msg-1', email, true);

      const found = await admin('GET', '/admin/idempotency/msg-1');
      expect(found.json()).toMatchObject({ sourceId: 'msg-1', state: 'completed' });
      expect((await admin('GET', '/admin/idempotency/msg-2')).statusCode).toBe(404);
    });

    it('should list drafts and move them through review', async () => {
      await deliver('msg-1', email, true);

      const listed = await admin('GET', '/admin/drafts?status=draft');
      const [draft] = listed.json().drafts;
      expect(draft).toMatchObject({ ticketId: '1000', to: 'alex@example.com', status: 'draft' });

      const approved = await admin('POST', `/admin/drafts/${draft.id}/status`, { status: 'approved' });
      expect(approved.json()).toMatchObject({ id: draft.id, status: 'approved' });

      const sent = await admin('POST', `/admin/drafts/${draft.id}/status`, { status: 'sent' });
      expect(sent.statusCode).toBe(200);
      const conflict = await admin('POST', `/admin/drafts/${draft.id}/status`, { status: 'draft' });
      expect(conflict.statusCode).toBe(409);
    });

    it('should validate draft requests', async () => {
      expect((await admin('GET', '/admin/drafts?status=lost')).statusCode).toBe(400);
      expect((await admin('POST', '/admin/drafts/x/status', { status: 'lost' })).statusCode).toBe(400);
      expect((await admin('POST', '/admin/drafts/x/status', { status: 'approved' })).statusCode).toBe(404);
    });

    it('should delete a draft', async () => {
      await deliver('msg-1', email, true);
      const [draft] = await ctx.pipeline.drafts.list();

      expect((await admin('DELETE', `/admin/drafts/${draft.id}`)).statusCode).toBe(204);
      expect((await admin('DELETE', `/admin/drafts/${draft.id}`)).statusCode).toBe(404);
      expect(await ctx.pipeline.drafts.list()).toEqual([]);
    });

    it('should clean up drafts past the retention window', async () => {
      await deliver('msg-1', email, true);

      const res = await admin('POST', '/admin/drafts/cleanup', {});
      expect(res.json()).toEqual({ removed: 0, olderThanDays: 30 });
      expect(await ctx.pipeline.drafts.list()).toHaveLength(1);

      const invalid = await admin('POST', '/admin/drafts/cleanup', { olderThanDays: -1 });
      expect(invalid.statusCode).toBe(400);
      expect(invalid.json()).toEqual({ error: 'body/olderThanDays must be >= 0' });
    });

    it('should manage knowledge documents', async () => {
      const doc = { id: 'warranty', title: 'Warranty terms', content: 'Devices carry a two year warranty.' };

      const added = await admin('POST', '/admin/knowledge/documents', doc);
      expect(added.statusCode).toBe(201);
      expect(added.json()).toEqual(doc);
      expect((await admin('POST', '/admin/knowledge/documents', doc)).statusCode).toBe(409);
      expect((await admin('POST', '/admin/knowledge/documents', { id: 'x' })).statusCode).toBe(400);

      const updated = await admin('PATCH', '/admin/knowledge/documents/warranty', { title: 'Warranty' });
      expect(updated.json()).toEqual({ ...doc, title: 'Warranty' });
      expect((await admin('PATCH', '/admin/knowledge/documents/warranty', {})).statusCode).toBe(400);
      expect((await admin('PATCH', '/admin/knowledge/documents/missing', { title: 'x' })).statusCode).toBe(404);

      expect((await admin('GET', '/admin/knowledge/stats')).json()).toEqual({
        faqCount: 1,
        documentCount: 1,
        stopWordCount: 0,
      });

      expect((await admin('DELETE', '/admin/knowledge/documents/warranty')).statusCode).toBe(204);
      expect((await admin('DELETE', '/admin/knowledge/documents/warranty')).statusCode).toBe(404);
    });

    it('should escalate a high priority ticket on a check and keep its history', async () => {
      classifier.setBehaviour(makeClassification('urgent_human'));
      await deliver('msg-1', email, true);

      const first = await admin('POST', '/admin/escalations/1000/check');
      expect(first.json()).toMatchObject({
        ticketId: '1000',
        escalated: true,
        level: 'urgent',
        escalation: { from: 'level_1', to: 'urgent', reason: 'urgency', detail: 'high priority ticket' },
      });

      const second = await admin('POST', '/admin/escalations/1000/check');
      expect(second.json()).toEqual({ ticketId: '1000', escalated: false, level: 'urgent', escalation: null });

      const history = await admin('GET', '/admin/escalations/1000');
      expect(history.json()).toMatchObject({ ticketId: '1000', level: 'urgent', history: [{ to: 'urgent' }] });
      expect((await admin('GET', '/admin/escalations')).json()).toEqual({
        total: 1,
        byLevel: { urgent: 1 },
        byReason: { urgency: 1 },
      });
    });

    it('should return 404 when checking an unknown ticket', async () => {
      expect((await admin('POST', '/admin/escalations/9999/check')).statusCode).toBe(404);
    });

    it('should report dependency health and queue stats', async () => {
      const deps = await admin('GET', '/admin/dependencies');
      expect(deps.json().degradation).toBe('none');
      expect(deps.json().dependencies).toEqual(
        expect.arrayContaining([expect.objectContaining({ dependency: 'classifier', state: 'closed' })]),
      );

      const queue = await admin('GET', '/admin/queue');
      expect(queue.json()).toEqual({ active: 0, queued: 0, lanes: 0, closed: false });
    });

    it('should serve Prometheus metrics', async () => {
      await deliver('msg-1', email, true);
      const res = await admin('GET', '/admin/metrics');

      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('inbox_pilot_events_submitted_total');
    });
  });
});
