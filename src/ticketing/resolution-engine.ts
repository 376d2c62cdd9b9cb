import type { Logger } from 'pino';
import { Classification, INTENT_PRIORITY, ParsedMessage, Ticket, Turn } from '../config/types';
import { ClosedTicketPolicy } from '../config/config-service';
import { TicketBackend } from './types';
import { createTurn } from './turns';
import { ResolutionDecision, TicketStateMachine } from './resolution-state-machine';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';
import { logger } from '../observability/logger';
import { ticketDecisions } from '../observability/metrics';

/** Ticket the message now belongs to, with the decision that led there */
export interface TicketHandle {
  ticket: Ticket;
  decision: ResolutionDecision;
  incomingTurn: Turn;
}

export interface ResolutionEngineOptions {
  closedTicketPolicy: ClosedTicketPolicy;
}

/** Tags for a new ticket: its intent, plus `time_range` when a period was asked for */
export function ticketTags(classification: Classification): string[] {
  const tags = [`intent:${classification.intent}`];
  if (classification.entities.months) tags.push('time_range');
  return tags;
}

/**
 * Ticket Resolution Engine — the only writer of ticket state.
 *
 * Runs inside the ticket's lane, so one ticket never sees two resolutions at once.
 * Every backend call goes through the resilience wrapper.
 */
export class TicketResolutionEngine {
  private readonly stateMachine = new TicketStateMachine();
  private readonly log: Logger;

  constructor(
    private readonly backend: TicketBackend,
    private readonly resilience: ResilienceWrapper,
    private readonly options: ResolutionEngineOptions,
  ) {
    this.log = logger.child({ component: 'resolution-engine' });
  }

  async resolve(message: ParsedMessage, classification: Classification, signal?: AbortSignal): Promise<TicketHandle> {
    const token = message.referenceToken;
    const referenced = token
      ? await this.resilience.invoke('ticketing', (s) => this.backend.fetch(token, s), { signal })
      : null;

    const decision = this.stateMachine.decide({
      referenceToken: token,
      referenced,
      intent: classification.intent,
      closedTicketPolicy: this.options.closedTicketPolicy,
    });
    ticketDecisions.inc({ decision: decision.kind });

    const incomingTurn = createTurn({
      direction: 'incoming',
      messageId: message.sourceId,
      intent: classification.intent,
      text: message.body || message.subject,
      attachments: message.attachments,
      timestamp: message.receivedAt,
    });

    const ticket = await this.apply(decision, message, classification, incomingTurn, signal);
    this.log.info(
      { sourceId: message.sourceId, ticketId: ticket.id, decision: decision.kind, referenceToken: token },
      'Ticket resolved',
    );
    return { ticket, decision, incomingTurn };
  }

  private async apply(
    decision: ResolutionDecision,
    message: ParsedMessage,
    classification: Classification,
    turn: Turn,
    signal?: AbortSignal,
  ): Promise<Ticket> {
    switch (decision.kind) {
      case 'reuse':
        return this.append(decision.ticket.id, turn, signal);

      case 'reopen': {
        await this.changeStatus(decision.ticket, 'open', `reopened by ${message.sourceId}`, signal);
        return this.append(decision.ticket.id, turn, signal);
      }

      case 'fork': {
        const created = await this.create(message, classification, turn, signal);
        // Previous ticket keeps its turns; only its status moves
        await this.changeStatus(decision.previous, 'superseded', `intent changed to ${classification.intent}`, signal, created.id);
        return created;
      }

      case 'create_fresh':
        return this.create(message, classification, turn, signal);
    }
  }

  private create(message: ParsedMessage, classification: Classification, turn: Turn, signal?: AbortSignal): Promise<Ticket> {
    return this.resilience.invoke(
      'ticketing',
      (s) =>
        this.backend.create(
          {
            externalRef: message.sourceId,
            sender: message.sender,
            subject: message.subject,
            intent: classification.intent,
            priority: INTENT_PRIORITY[classification.intent],
            tags: ticketTags(classification),
            initialTurn: turn,
          },
          s,
        ),
      { signal },
    );
  }

  private append(ticketId: string, turn: Turn, signal?: AbortSignal): Promise<Ticket> {
    return this.resilience.invoke('ticketing', (s) => this.backend.appendTurn(ticketId, turn, s), { signal });
  }

  private async changeStatus(
    ticket: Ticket,
    target: Ticket['status'],
    reason: string,
    signal?: AbortSignal,
    supersededBy?: string,
  ): Promise<void> {
    const { event } = this.stateMachine.transition(ticket.id, ticket.status, target, reason);
    if (!event) return;
    await this.resilience.invoke(
      'ticketing',
      (s) => this.backend.updateStatus({ ticketId: ticket.id, status: event.to, supersededBy }, s),
      { signal },
    );
  }
}
