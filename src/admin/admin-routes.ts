import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import Ajv from 'ajv';
import { env } from '../config/env';
import { ErrorQueue } from '../queue/types';
import { WorkQueue } from '../queue/work-queue';
import { replayAllErrorEntries, replayErrorEntry } from '../queue/replay';
import { IdempotencyStore } from '../idempotency/types';
import { DraftStatus, DraftStore } from '../drafts/types';
import { ManagedKnowledgeStore, PolicyEntry } from '../knowledge/types';
import { EscalationTracker } from '../escalation/escalation-tracker';
import { TicketBackend } from '../ticketing/types';
import { DependencyHealthManager } from '../resilience/dependency-health';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';
import { PermanentDependencyError } from '../resilience/errors';
import { logger } from '../observability/logger';
import { getContentType, getMetrics } from '../observability/metrics';

export interface AdminDeps {
  errorQueue: ErrorQueue;
  idempotency: IdempotencyStore;
  queue: WorkQueue;
  health: DependencyHealthManager;
  drafts: DraftStore;
  knowledge: ManagedKnowledgeStore;
  escalations: EscalationTracker;
  tickets: TicketBackend;
  resilience: ResilienceWrapper;
  adminApiKey?: string;
}

const DAY_MS = 86_400_000;
const DEFAULT_DRAFT_RETENTION_DAYS = 30;

const ajv = new Ajv();

const validateDocument = ajv.compile<PolicyEntry>({
  type: 'object',
  required: ['id', 'title', 'content'],
  properties: {
    id: { type: 'string', minLength: 1, maxLength: 128 },
    title: { type: 'string', minLength: 1 },
    content: { type: 'string', minLength: 1 },
  },
});

const validateDocumentChanges = ajv.compile<Partial<Omit<PolicyEntry, 'id'>>>({
  type: 'object',
  minProperties: 1,
  additionalProperties: false,
  properties: {
    title: { type: 'string', minLength: 1 },
    content: { type: 'string', minLength: 1 },
  },
});

const validateCleanup = ajv.compile<{ olderThanDays?: number }>({
  type: 'object',
  properties: { olderThanDays: { type: 'integer', minimum: 0 } },
});

const DRAFT_STATUSES: readonly DraftStatus[] = ['draft', 'approved', 'sent', 'discarded'];

function isDraftStatus(value: unknown): value is DraftStatus {
  return DRAFT_STATUSES.some((s) => s === value);
}

function parseLimit(raw: string | undefined, fallback: number): number {
  const parsed = raw ? parseInt(raw, 10) : NaN;
  if (Number.isNaN(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, 1000);
}

export function registerAdminRoutes(app: FastifyInstance, deps: AdminDeps): void {
  const adminKey = deps.adminApiKey ?? env.adminApiKey;

  function verifyAdminKey(req: FastifyRequest, reply: FastifyReply): boolean {
    const key = req.headers['x-admin-key'];
    // No configured key means the admin surface is closed
    if (!adminKey || typeof key !== 'string' || key !== adminKey) {
      reply.status(403).send({ error: 'Forbidden' });
      return false;
    }
    return true;
  }

  // ───── Error Queue ───────────────────────────────────────────

  app.get<{ Querystring: { limit?: string } }>('/admin/error-queue', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const entries = await deps.errorQueue.list(parseLimit(req.query.limit, 100));
    const size = await deps.errorQueue.size();
    return reply.send({ size, entries });
  });

  /** Release the admission and resubmit the original event */
  app.post<{ Params: { id: string } }>('/admin/error-queue/:id/replay', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const result = await replayErrorEntry(req.params.id, deps);
    switch (result.status) {
      case 'not_found':
        return reply.status(404).send({ error: 'Entry not found' });
      case 'refused':
        return reply.status(result.reason === 'lane_full' ? 429 : 503).send({ error: `Replay refused: ${result.reason}` });
      case 'resubmitted':
        logger.info({ admin: true, entryId: req.params.id, laneKey: result.laneKey }, 'Error-queue entry replayed');
        return reply.status(202).send({ status: 'resubmitted', laneKey: result.laneKey });
    }
  });

  app.post<{ Querystring: { limit?: string } }>('/admin/error-queue/replay', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const summary = await replayAllErrorEntries(deps, parseLimit(req.query.limit, 100));
    logger.info({ admin: true, ...summary }, 'Error queue replay triggered');
    return reply.status(202).send(summary);
  });

  app.get<{ Params: { sourceId: string } }>('/admin/idempotency/:sourceId', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const record = await deps.idempotency.get(req.params.sourceId);
    if (!record) return reply.status(404).send({ error: 'No record' });
    return reply.send(record);
  });

  // ───── Runtime Status ────────────────────────────────────────

  app.get('/admin/dependencies', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    return reply.send({
      degradation: deps.health.getDegradationLevel(),
      dependencies: deps.health.getAllStatuses(),
    });
  });

  app.get('/admin/queue', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    return reply.send(deps.queue.stats());
  });

  app.get('/admin/metrics', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    const metrics = await getMetrics();
    return reply.header('content-type', getContentType()).send(metrics);
  });

  // ───── Drafts ────────────────────────────────────────────────

  app.get<{ Querystring: { status?: string; ticketId?: string } }>('/admin/drafts', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const { status, ticketId } = req.query;
    if (status !== undefined && !isDraftStatus(status)) {
      return reply.status(400).send({ error: `Unknown draft status: ${status}` });
    }
    return reply.send({ drafts: await deps.drafts.list({ status, ticketId }) });
  });

  app.post<{ Params: { id: string }; Body: { status?: unknown } }>('/admin/drafts/:id/status', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const status = req.body?.status;
    if (!isDraftStatus(status)) {
      return reply.status(400).send({ error: 'status must be one of draft, approved, sent, discarded' });
    }
    if (!(await deps.drafts.get(req.params.id))) {
      return reply.status(404).send({ error: 'Draft not found' });
    }
    try {
      const draft = await deps.drafts.updateStatus(req.params.id, status);
      logger.info({ admin: true, draftId: draft.id, status }, 'Draft status changed');
      return reply.send(draft);
    } catch (err) {
      if (err instanceof PermanentDependencyError) {
        return reply.status(409).send({ error: err.message });
      }
      throw err;
    }
  });

  app.delete<{ Params: { id: string } }>('/admin/drafts/:id', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    if (!(await deps.drafts.delete(req.params.id))) {
      return reply.status(404).send({ error: 'Draft not found' });
    }
    logger.info({ admin: true, draftId: req.params.id }, 'Draft deleted');
    return reply.status(204).send();
  });

  app.post<{ Body: unknown }>('/admin/drafts/cleanup', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const body = req.body ?? {};
    if (!validateCleanup(body)) {
      return reply.status(400).send({ error: ajv.errorsText(validateCleanup.errors, { dataVar: 'body' }) });
    }
    const days = body.olderThanDays ?? DEFAULT_DRAFT_RETENTION_DAYS;
    const removed = await deps.drafts.cleanupOlderThan(Date.now() - days * DAY_MS);
    logger.info({ admin: true, removed, olderThanDays: days }, 'Draft cleanup run');
    return reply.send({ removed, olderThanDays: days });
  });

  // ───── Knowledge ─────────────────────────────────────────────

  app.get('/admin/knowledge/stats', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    return reply.send(await deps.knowledge.stats());
  });

  app.post<{ Body: unknown }>('/admin/knowledge/documents', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const body = req.body;
    if (!validateDocument(body)) {
      return reply.status(400).send({ error: ajv.errorsText(validateDocument.errors, { dataVar: 'body' }) });
    }
    if (!(await deps.knowledge.addDocument(body))) {
      return reply.status(409).send({ error: `Document ${body.id} already exists` });
    }
    logger.info({ admin: true, documentId: body.id }, 'Knowledge document added');
    return reply.status(201).send({ id: body.id, title: body.title, content: body.content });
  });

  app.patch<{ Params: { id: string }; Body: unknown }>('/admin/knowledge/documents/:id', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const body = req.body;
    if (!validateDocumentChanges(body)) {
      return reply.status(400).send({ error: ajv.errorsText(validateDocumentChanges.errors, { dataVar: 'body' }) });
    }
    const updated = await deps.knowledge.updateDocument(req.params.id, body);
    if (!updated) return reply.status(404).send({ error: 'Document not found' });
    logger.info({ admin: true, documentId: updated.id }, 'Knowledge document updated');
    return reply.send(updated);
  });

  app.delete<{ Params: { id: string } }>('/admin/knowledge/documents/:id', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    if (!(await deps.knowledge.deleteDocument(req.params.id))) {
      return reply.status(404).send({ error: 'Document not found' });
    }
    logger.info({ admin: true, documentId: req.params.id }, 'Knowledge document deleted');
    return reply.status(204).send();
  });

  // ───── Escalations ───────────────────────────────────────────

  app.get('/admin/escalations', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    return reply.send(deps.escalations.summary());
  });

  app.get<{ Params: { ticketId: string } }>('/admin/escalations/:ticketId', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const { ticketId } = req.params;
    return reply.send({
      ticketId,
      level: deps.escalations.levelOf(ticketId),
      history: deps.escalations.historyOf(ticketId),
    });
  });

  /** Run the escalation rules against a ticket now */
  app.post<{ Params: { ticketId: string } }>('/admin/escalations/:ticketId/check', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;

    const { ticketId } = req.params;
    const ticket = await deps.resilience.invoke('ticketing', (signal) => deps.tickets.fetch(ticketId, signal));
    if (!ticket) return reply.status(404).send({ error: 'Ticket not found' });

    const escalation = await deps.escalations.review(ticket);
    return reply.send({ ticketId, escalated: escalation !== null, level: deps.escalations.levelOf(ticketId), escalation });
  });
}
