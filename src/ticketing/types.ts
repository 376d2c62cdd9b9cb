import { IntentLabel, Ticket, TicketPriority, TicketStatus, Turn } from '../config/types';

export interface CreateTicketParams {
  /** Source message id; backends use it to deduplicate re-creates */
  externalRef: string;
  sender: string;
  subject: string;
  intent: IntentLabel;
  priority: TicketPriority;
  tags: string[];
  initialTurn: Turn;
}

export interface UpdateStatusParams {
  ticketId: string;
  status: TicketStatus;
  supersededBy?: string;
}

/**
 * Ticket backend. Every method may be retried by the resilience layer,
 * so `create` and `appendTurn` must tolerate repeats.
 */
export interface TicketBackend {
  fetch(ticketId: string, signal?: AbortSignal): Promise<Ticket | null>;
  create(params: CreateTicketParams, signal?: AbortSignal): Promise<Ticket>;
  /** Appending a turn whose (direction, messageId) is already present is a no-op */
  appendTurn(ticketId: string, turn: Turn, signal?: AbortSignal): Promise<Ticket>;
  updateStatus(params: UpdateStatusParams, signal?: AbortSignal): Promise<Ticket>;
}
