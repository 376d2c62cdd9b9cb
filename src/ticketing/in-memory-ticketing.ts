import { Ticket, Turn } from '../config/types';
import { CreateTicketParams, TicketBackend, UpdateStatusParams } from './types';
import { isSameTurn } from './turns';
import { PermanentDependencyError } from '../resilience/errors';
import { logger } from '../observability/logger';
import { ticketOperations } from '../observability/metrics';

function copy(ticket: Ticket): Ticket {
  return { ...ticket, turns: [...ticket.turns], ...(ticket.tags && { tags: [...ticket.tags] }) };
}

/**
 * In-memory ticket backend for local development and testing.
 * Numeric ids from 1000, so reference tokens like [TICKET-1000] resolve.
 */
export class InMemoryTicketBackend implements TicketBackend {
  private tickets: Map<string, Ticket> = new Map();
  private externalRefIndex: Map<string, string> = new Map();
  private idCounter = 1000;

  async fetch(ticketId: string): Promise<Ticket | null> {
    const ticket = this.tickets.get(ticketId);
    return ticket ? copy(ticket) : null;
  }

  async create(params: CreateTicketParams): Promise<Ticket> {
    const existingId = this.externalRefIndex.get(params.externalRef);
    const existing = existingId ? this.tickets.get(existingId) : undefined;
    if (existing) {
      logger.info({ ticketId: existing.id, externalRef: params.externalRef }, '[MEMORY] Ticket create deduplicated');
      return copy(existing);
    }

    const now = Date.now();
    const ticket: Ticket = {
      id: String(this.idCounter++),
      status: 'open',
      turns: [params.initialTurn],
      lastIntent: params.intent,
      priority: params.priority,
      tags: [...params.tags],
      sender: params.sender,
      subject: params.subject,
      externalRef: params.externalRef,
      createdAt: now,
      updatedAt: now,
    };

    this.tickets.set(ticket.id, ticket);
    this.externalRefIndex.set(params.externalRef, ticket.id);

    ticketOperations.inc({ operation: 'create', status: 'success' });
    logger.info({ ticketId: ticket.id, intent: params.intent }, '[MEMORY] Ticket created');
    return copy(ticket);
  }

  async appendTurn(ticketId: string, turn: Turn): Promise<Ticket> {
    const ticket = this.require(ticketId, 'append');
    if (!ticket.turns.some((t) => isSameTurn(t, turn))) {
      ticket.turns.push(turn);
      if (turn.direction === 'incoming') ticket.lastIntent = turn.intent;
      ticket.updatedAt = Date.now();
    }
    ticketOperations.inc({ operation: 'append', status: 'success' });
    return copy(ticket);
  }

  async updateStatus(params: UpdateStatusParams): Promise<Ticket> {
    const ticket = this.require(params.ticketId, 'update');
    ticket.status = params.status;
    if (params.supersededBy) ticket.supersededBy = params.supersededBy;
    ticket.updatedAt = Date.now();

    ticketOperations.inc({ operation: 'update', status: 'success' });
    logger.info({ ticketId: ticket.id, status: ticket.status }, '[MEMORY] Ticket status updated');
    return copy(ticket);
  }

  /** Test helper: get all tickets */
  getAllTickets(): Ticket[] {
    return Array.from(this.tickets.values()).map(copy);
  }

  /** Test helper: seed or overwrite a ticket */
  put(ticket: Ticket): void {
    this.tickets.set(ticket.id, copy(ticket));
    if (ticket.externalRef) this.externalRefIndex.set(ticket.externalRef, ticket.id);
  }

  /** Test helper: reset state */
  reset(): void {
    this.tickets.clear();
    this.externalRefIndex.clear();
    this.idCounter = 1000;
  }

  private require(ticketId: string, operation: string): Ticket {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) {
      ticketOperations.inc({ operation, status: 'error' });
      throw new PermanentDependencyError('ticketing', `Ticket ${ticketId} not found`);
    }
    return ticket;
  }
}
