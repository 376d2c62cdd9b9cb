import { IntentLabel, Ticket, TicketStatus } from '../config/types';
import { ClosedTicketPolicy } from '../config/config-service';
import { logger } from '../observability/logger';

/** Allowed ticket status transitions; `superseded` is terminal */
export const TICKET_TRANSITIONS: Record<TicketStatus, readonly TicketStatus[]> = {
  open: ['closed', 'superseded'],
  closed: ['open', 'superseded'],
  superseded: [],
};

export interface TicketTransitionEvent {
  ticketId: string;
  from: TicketStatus;
  to: TicketStatus;
  reason: string;
  timestamp: number;
}

/** Outcome of matching an inbound message against the ticket it references */
export type ResolutionDecision =
  | { kind: 'reuse'; ticket: Ticket }
  | { kind: 'reopen'; ticket: Ticket }
  | { kind: 'fork'; previous: Ticket }
  | { kind: 'create_fresh'; reason: 'no_reference' | 'stale_reference' };

export interface DecisionInput {
  referenceToken?: string;
  /** Ticket the token resolved to, null when absent or not found */
  referenced: Ticket | null;
  intent: IntentLabel;
  closedTicketPolicy: ClosedTicketPolicy;
}

export class TicketStateMachine {
  /**
   * Attempt a status transition. Returns the new status if valid, or the current status if not.
   */
  transition(
    ticketId: string,
    current: TicketStatus,
    target: TicketStatus,
    reason: string,
  ): { newStatus: TicketStatus; event: TicketTransitionEvent | null } {
    if (current === target) {
      return { newStatus: current, event: null };
    }

    if (!TICKET_TRANSITIONS[current].includes(target)) {
      logger.warn({ ticketId, from: current, to: target, reason }, 'Invalid ticket transition attempted');
      return { newStatus: current, event: null };
    }

    const event: TicketTransitionEvent = {
      ticketId,
      from: current,
      to: target,
      reason,
      timestamp: Date.now(),
    };
    logger.info(event, 'Ticket transition');
    return { newStatus: target, event };
  }

  /**
   * Decide what to do with the referenced ticket. Pure: no I/O, no mutation.
   *
   * A superseded ticket is never continued; the conversation already moved on.
   * A closed ticket is reopened only under the `reopen` policy and a matching intent.
   */
  decide(input: DecisionInput): ResolutionDecision {
    if (input.referenceToken === undefined) return { kind: 'create_fresh', reason: 'no_reference' };

    const ticket = input.referenced;
    if (!ticket) return { kind: 'create_fresh', reason: 'stale_reference' };

    const sameIntent = ticket.lastIntent === input.intent;

    switch (ticket.status) {
      case 'open':
        return sameIntent ? { kind: 'reuse', ticket } : { kind: 'fork', previous: ticket };
      case 'closed':
        return input.closedTicketPolicy === 'reopen' && sameIntent
          ? { kind: 'reopen', ticket }
          : { kind: 'fork', previous: ticket };
      case 'superseded':
        return { kind: 'fork', previous: ticket };
    }
  }
}
