import Ajv from 'ajv';
import type { Logger } from 'pino';
import { INTENT_LABELS, Ticket, Turn } from '../config/types';
import { CreateTicketParams, TicketBackend, UpdateStatusParams } from './types';
import { TURN_SCHEMA, WireTurn, freezeTurn, turnKey } from './turns';
import { PermanentDependencyError, errorFromStatus } from '../resilience/errors';
import { logger } from '../observability/logger';
import { ticketOperations } from '../observability/metrics';

/**
 * Helpdesk REST ticket backend.
 *
 * - GET   /tickets/{id}
 * - POST  /tickets                 (Idempotency-Key: source message id)
 * - POST  /tickets/{id}/turns      (Idempotency-Key: direction:messageId)
 * - PATCH /tickets/{id}
 *
 * Responses are validated before they reach the resolution engine.
 */

const TICKET_SCHEMA = {
  type: 'object',
  required: ['id', 'status', 'lastIntent', 'priority', 'sender', 'subject', 'createdAt', 'updatedAt'],
  properties: {
    id: { type: ['string', 'number'] },
    status: { enum: ['open', 'closed', 'superseded'] },
    turns: { type: 'array', items: TURN_SCHEMA },
    lastIntent: { enum: [...INTENT_LABELS] },
    priority: { enum: ['low', 'medium', 'high'] },
    sender: { type: 'string' },
    subject: { type: 'string' },
    externalRef: { type: 'string' },
    tags: { type: 'array', items: { type: 'string' } },
    supersededBy: { type: 'string' },
    createdAt: { type: 'number' },
    updatedAt: { type: 'number' },
  },
};

interface WireTicket extends Omit<Ticket, 'id' | 'turns'> {
  id: string | number;
  turns?: WireTurn[];
}

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validateTicket = ajv.compile<WireTicket>(TICKET_SCHEMA);

export interface HelpdeskOptions {
  baseUrl: string;
  apiToken: string;
}

export class HelpdeskTicketBackend implements TicketBackend {
  private readonly log: Logger;

  constructor(private readonly options: HelpdeskOptions) {
    this.log = logger.child({ service: 'helpdesk-ticketing' });
  }

  async fetch(ticketId: string, signal?: AbortSignal): Promise<Ticket | null> {
    const res = await this.request('GET', `/tickets/${encodeURIComponent(ticketId)}`, undefined, signal);
    if (res === null) return null;
    return this.toTicket(res, 'fetch');
  }

  async create(params: CreateTicketParams, signal?: AbortSignal): Promise<Ticket> {
    const payload = {
      externalRef: params.externalRef,
      sender: params.sender,
      subject: params.subject,
      intent: params.intent,
      priority: params.priority,
      tags: params.tags,
      initialTurn: params.initialTurn,
    };
    const res = await this.request('POST', '/tickets', payload, signal, params.externalRef);
    const ticket = this.toTicket(res, 'create');
    this.log.info({ ticketId: ticket.id, intent: params.intent }, 'Ticket created via helpdesk');
    return ticket;
  }

  async appendTurn(ticketId: string, turn: Turn, signal?: AbortSignal): Promise<Ticket> {
    const res = await this.request('POST', `/tickets/${encodeURIComponent(ticketId)}/turns`, turn, signal, turnKey(turn));
    return this.toTicket(res, 'append');
  }

  async updateStatus(params: UpdateStatusParams, signal?: AbortSignal): Promise<Ticket> {
    const payload = { status: params.status, supersededBy: params.supersededBy };
    const res = await this.request('PATCH', `/tickets/${encodeURIComponent(params.ticketId)}`, payload, signal);
    return this.toTicket(res, 'update');
  }

  /** Returns the parsed body, or null on 404 */
  private async request(
    method: string,
    path: string,
    body: unknown,
    signal: AbortSignal | undefined,
    idempotencyKey?: string,
  ): Promise<unknown> {
    const operation = method === 'GET' ? 'fetch' : path.endsWith('/turns') ? 'append' : method === 'POST' ? 'create' : 'update';
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiToken}`,
      'Content-Type': 'application/json',
    };
    if (idempotencyKey) headers['Idempotency-Key'] = idempotencyKey;

    const res = await fetch(`${this.options.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal,
    });

    if (res.status === 404 && method === 'GET') return null;

    if (!res.ok) {
      const errBody = await res.text();
      ticketOperations.inc({ operation, status: 'error' });
      this.log.error({ status: res.status, method, path }, 'Helpdesk API error');
      throw errorFromStatus('ticketing', res.status, errBody);
    }

    ticketOperations.inc({ operation, status: 'success' });
    const parsed: unknown = await res.json();
    return parsed;
  }

  private toTicket(data: unknown, operation: string): Ticket {
    if (!validateTicket(data)) {
      const reason = validateTicket.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      throw new PermanentDependencyError('ticketing', `Helpdesk ${operation} returned an invalid ticket: ${reason}`);
    }
    return {
      ...data,
      id: String(data.id),
      turns: (data.turns ?? []).map(freezeTurn),
    };
  }
}
