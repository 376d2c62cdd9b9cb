import { AttachmentPointer, Classification, INTENT_LABELS, IntentLabel, Turn } from '../config/types';
import { LowConfidencePolicy } from '../config/config-service';
import { DispatchResult, HandlerContext, HandlerOutcome, IntentHandler } from './types';
import { FallbackHandler } from './fallback-handler';
import { DraftCreator } from '../drafts/types';
import { ConversationMemory } from '../memory/types';
import { TicketBackend } from '../ticketing/types';
import { createTurn } from '../ticketing/turns';
import { formatReferenceToken } from '../ticketing/reference-token';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';
import { isTerminal } from '../resilience/errors';
import { dispatches } from '../observability/metrics';

export interface DispatchRouterDeps {
  handlers: IntentHandler[];
  fallback: FallbackHandler;
  drafts: DraftCreator;
  memory: ConversationMemory;
  tickets: TicketBackend;
  resilience: ResilienceWrapper;
}

export interface DispatchRouterOptions {
  minConfidence: number;
  lowConfidencePolicy: LowConfidencePolicy;
  signature?: string;
}

const DEFAULT_SIGNATURE = 'Kind regards,\nCustomer Support';

/** `Re: <subject> [TICKET-id]`, without stacking prefixes or tokens on long threads */
export function replySubject(subject: string, ticketId?: string): string {
  const base = subject.trim() || '(no subject)';
  const prefixed = /^re:/i.test(base) ? base : `Re: ${base}`;
  if (!ticketId) return prefixed;
  const token = formatReferenceToken(ticketId);
  return prefixed.toUpperCase().includes(token.toUpperCase()) ? prefixed : `${prefixed} ${token}`;
}

/**
 * Dispatch Router — one handler per intent label.
 *
 * Success: draft (resilient), then the outgoing turn into memory and the ticket.
 * A handler that fails terminally or asks to escalate degrades to the fallback
 * path (notify + acknowledge). Only a failed notification escapes as an error.
 */
export class DispatchRouter {
  private readonly routes = new Map<IntentLabel, IntentHandler | FallbackHandler>();
  private readonly signature: string;

  constructor(
    private readonly deps: DispatchRouterDeps,
    private readonly options: DispatchRouterOptions,
  ) {
    for (const handler of [...deps.handlers, deps.fallback]) {
      for (const intent of handler.intents) {
        if (this.routes.has(intent)) throw new Error(`Duplicate handler for intent ${intent}`);
        this.routes.set(intent, handler);
      }
    }
    const missing = INTENT_LABELS.filter((intent) => !this.routes.has(intent));
    if (missing.length > 0) throw new Error(`No handler for intents: ${missing.join(', ')}`);

    this.signature = options.signature ?? DEFAULT_SIGNATURE;
  }

  /** Intent whose handler runs, after the low-confidence policy */
  selectIntent(classification: Classification | null): IntentLabel {
    if (!classification) return 'fallback_human';
    if (this.options.lowConfidencePolicy === 'fallback' && classification.confidence < this.options.minConfidence) {
      return 'fallback_human';
    }
    return classification.intent;
  }

  async dispatch(ctx: HandlerContext): Promise<DispatchResult> {
    const intent = this.selectIntent(ctx.classification);
    const handler = this.routes.get(intent);

    if (!handler || handler instanceof FallbackHandler) {
      return this.fallbackPath(ctx, intent, undefined, this.escalationReason(ctx.classification, intent));
    }

    let outcome: HandlerOutcome;
    try {
      outcome = await handler.handle(ctx);
    } catch (err) {
      if (!isTerminal(err)) throw err;
      ctx.log.warn({ err, intent }, 'Handler failed; degrading to fallback');
      dispatches.inc({ handler: intent, result: 'failed' });
      return this.fallbackPath(ctx, intent, intent, `${intent} handler failed: ${errorMessage(err)}`);
    }

    if (outcome.kind === 'escalate') {
      dispatches.inc({ handler: intent, result: 'escalated' });
      return this.fallbackPath(ctx, intent, intent, outcome.reason);
    }

    let draftId: string;
    try {
      draftId = await this.createDraft(ctx, outcome.body, outcome.attachments);
    } catch (err) {
      if (!isTerminal(err)) throw err;
      ctx.log.warn({ err, intent }, 'Draft creation failed; degrading to fallback');
      dispatches.inc({ handler: intent, result: 'failed' });
      return this.fallbackPath(ctx, intent, intent, `draft creation failed: ${errorMessage(err)}`);
    }

    // Recording failures propagate: the draft exists and a replay re-records idempotently
    const outgoingTurn = await this.recordOutgoing(ctx, intent, outcome.body, outcome.attachments, draftId);
    dispatches.inc({ handler: intent, result: 'success' });
    return { disposition: 'draft_created', handler: intent, draftId, outgoingTurn };
  }

  private async fallbackPath(
    ctx: HandlerContext,
    intent: IntentLabel,
    degradedFrom: IntentLabel | undefined,
    reason: string,
  ): Promise<DispatchResult> {
    const { team, acknowledgment } = await this.deps.fallback.escalate(ctx, intent, reason);

    // The team has been notified; a lost acknowledgment draft does not undo that
    try {
      const draftId = await this.createDraft(ctx, acknowledgment, []);
      const outgoingTurn = await this.recordOutgoing(ctx, intent, acknowledgment, [], draftId);
      dispatches.inc({ handler: 'fallback', result: 'success' });
      return { disposition: 'fallback_acknowledged', handler: intent, draftId, notified: team, degradedFrom, outgoingTurn };
    } catch (err) {
      if (!isTerminal(err)) throw err;
      ctx.log.error({ err, team }, 'Acknowledgment draft failed after escalation');
      dispatches.inc({ handler: 'fallback', result: 'partial' });
      return { disposition: 'fallback_acknowledged', handler: intent, notified: team, degradedFrom };
    }
  }

  private createDraft(ctx: HandlerContext, body: string, attachments: AttachmentPointer[]): Promise<string> {
    const ticketId = ctx.handle?.ticket.id;
    return this.deps.resilience.invoke(
      'drafts',
      (signal) =>
        this.deps.drafts.createDraft(
          {
            ticketId,
            to: ctx.message.sender,
            subject: replySubject(ctx.message.subject, ticketId),
            body: `Hello,\n\n${body}\n\n${this.signature}`,
            attachments,
            sourceMessageId: ctx.message.sourceId,
          },
          signal,
        ),
      { signal: ctx.signal },
    );
  }

  private async recordOutgoing(
    ctx: HandlerContext,
    intent: IntentLabel,
    text: string,
    attachments: AttachmentPointer[],
    draftId: string,
  ): Promise<Turn> {
    const turn = createTurn({
      direction: 'outgoing',
      messageId: ctx.message.sourceId,
      intent,
      text,
      attachments,
      draftId,
    });

    const handle = ctx.handle;
    if (!handle) return turn;

    const ticketId = handle.ticket.id;
    await this.deps.resilience.invoke('memory', () => this.deps.memory.append(ticketId, turn), { signal: ctx.signal });
    await this.deps.resilience.invoke('ticketing', (signal) => this.deps.tickets.appendTurn(ticketId, turn, signal), {
      signal: ctx.signal,
    });
    return turn;
  }

  private escalationReason(classification: Classification | null, intent: IntentLabel): string {
    if (!classification) return 'classification unavailable';
    if (classification.intent !== intent) {
      return `confidence ${classification.confidence} below ${this.options.minConfidence} (classified ${classification.rawIntent})`;
    }
    return classification.reasoning ?? `classified as ${intent}`;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
