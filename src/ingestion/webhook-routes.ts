import { FastifyInstance } from 'fastify';
import Ajv from 'ajv';
import { InboundEvent } from '../config/types';
import { WorkQueue } from '../queue/work-queue';
import { logger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';

interface EmailWebhookBody {
  sourceId: string;
  rawPayload: unknown;
  receivedAt?: number;
}

const ajv = new Ajv();
const validateBody = ajv.compile<EmailWebhookBody>({
  type: 'object',
  required: ['sourceId', 'rawPayload'],
  properties: {
    sourceId: { type: 'string', minLength: 1, maxLength: 512 },
    rawPayload: {},
    receivedAt: { type: 'number' },
  },
});

/** Seconds a sender should wait before retrying a refused delivery */
const LANE_FULL_RETRY_AFTER_S = 5;

export function registerEmailWebhook(app: FastifyInstance, queue: WorkQueue): void {
  /**
   * Ingestion endpoint. Delivery is at-least-once; duplicates are absorbed downstream.
   * `?wait=true` holds the response until the event has finished processing.
   */
  app.post<{ Querystring: { wait?: string } }>('/webhooks/email', async (req, reply) => {
    const trace = createTraceContext();
    const log = logger.child({ requestId: trace.requestId });

    const body = req.body;
    if (!validateBody(body)) {
      log.warn({ errors: ajv.errorsText(validateBody.errors) }, 'Rejected malformed webhook body');
      return reply.status(400).send({ error: ajv.errorsText(validateBody.errors, { dataVar: 'body' }) });
    }

    const event: InboundEvent = {
      sourceId: body.sourceId,
      rawPayload: body.rawPayload,
      receivedAt: body.receivedAt ?? Date.now(),
    };

    const receipt = queue.submit(event);
    if (!receipt.accepted) {
      if (receipt.reason === 'lane_full') {
        return reply
          .status(429)
          .header('retry-after', String(LANE_FULL_RETRY_AFTER_S))
          .send({ error: 'Lane full', laneKey: receipt.laneKey });
      }
      return reply.status(503).send({ error: 'Shutting down' });
    }

    log.info({ sourceId: event.sourceId, laneKey: receipt.laneKey }, 'Email event accepted');

    if (req.query.wait === 'true') {
      const result = await receipt.completion;
      return reply.status(200).send({ sourceId: event.sourceId, laneKey: receipt.laneKey, result });
    }
    return reply.status(202).send({ status: 'accepted', sourceId: event.sourceId, laneKey: receipt.laneKey });
  });
}
