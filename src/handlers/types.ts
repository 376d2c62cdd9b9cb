import type { Logger } from 'pino';
import {
  AttachmentPointer,
  Classification,
  HumanTeam,
  IntentLabel,
  ParsedMessage,
  Turn,
} from '../config/types';
import { TicketHandle } from '../ticketing/resolution-engine';

export interface HandlerContext {
  message: ParsedMessage;
  /** Null when classification failed and no ticket was resolved */
  handle: TicketHandle | null;
  classification: Classification | null;
  /** Recent turns of the ticket, oldest first */
  history: readonly Turn[];
  signal?: AbortSignal;
  log: Logger;
}

/** What a business handler decided */
export type HandlerOutcome =
  | { kind: 'reply'; body: string; attachments: AttachmentPointer[] }
  | { kind: 'escalate'; reason: string };

export interface IntentHandler {
  readonly intents: readonly IntentLabel[];
  handle(ctx: HandlerContext): Promise<HandlerOutcome>;
}

export interface DispatchResult {
  disposition: 'draft_created' | 'fallback_acknowledged';
  /** Intent whose handler produced the reply */
  handler: IntentLabel;
  draftId?: string;
  notified?: HumanTeam;
  /** Set when a handler failed or escalated and the fallback path took over */
  degradedFrom?: IntentLabel;
  outgoingTurn?: Turn;
}
