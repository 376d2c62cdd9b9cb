import { HumanTeam, INTENT_PRIORITY, INTENT_TEAM, IntentLabel } from '../config/types';
import { HandlerContext } from './types';
import { Notifier } from '../escalation/types';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';
import { getStaticAcknowledgment } from '../resilience/static-fallbacks';

const BODY_PREVIEW_CHARS = 500;

export interface Escalation {
  team: HumanTeam;
  acknowledgment: string;
}

/**
 * Human hand-off: notify the team that owns the intent, acknowledge the sender.
 * Serves `urgent_human` and `fallback_human` directly, and every degraded dispatch.
 */
export class FallbackHandler {
  readonly intents: readonly IntentLabel[] = ['urgent_human', 'fallback_human'];

  constructor(
    private readonly notifier: Notifier,
    private readonly resilience: ResilienceWrapper,
  ) {}

  /** Notification failure propagates; the caller routes the event to the error queue */
  async escalate(ctx: HandlerContext, intent: IntentLabel, reason: string): Promise<Escalation> {
    const team = INTENT_TEAM[intent];
    const priority = INTENT_PRIORITY[intent];
    const ticketId = ctx.handle?.ticket.id;
    // Password requests may carry credentials in the body
    const preview = intent === 'password_update' ? '(message body withheld)' : ctx.message.body.slice(0, BODY_PREVIEW_CHARS);

    await this.resilience.invoke(
      'notifications',
      (signal) =>
        this.notifier.notify(
          team,
          {
            subject: `${intent}: ${ctx.message.subject || '(no subject)'}`,
            body: `From: ${ctx.message.sender}\nReason: ${reason}\n\n${preview}`,
            priority,
            ticketId,
            sourceId: ctx.message.sourceId,
          },
          signal,
        ),
      { signal: ctx.signal },
    );

    ctx.log.info({ team, priority, intent, reason }, 'Escalated to human team');
    return { team, acknowledgment: getStaticAcknowledgment(intent) };
  }
}
