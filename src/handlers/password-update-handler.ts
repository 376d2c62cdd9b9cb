import { INTENT_PRIORITY, IntentLabel } from '../config/types';
import { HandlerContext, HandlerOutcome, IntentHandler } from './types';
import { Notifier } from '../escalation/types';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';

export interface PasswordUpdateOptions {
  passwordResetUrl: string;
}

/**
 * Points the sender at self-service reset and lets IT support know.
 * Nothing from the email body is echoed; it may contain credentials.
 */
export class PasswordUpdateHandler implements IntentHandler {
  readonly intents: readonly IntentLabel[] = ['password_update'];

  constructor(
    private readonly notifier: Notifier,
    private readonly resilience: ResilienceWrapper,
    private readonly options: PasswordUpdateOptions,
  ) {}

  async handle(ctx: HandlerContext): Promise<HandlerOutcome> {
    const ticketId = ctx.handle?.ticket.id;

    await this.resilience.invoke(
      'notifications',
      (signal) =>
        this.notifier.notify(
          'it_support',
          {
            subject: 'Password update requested',
            body: `From: ${ctx.message.sender}\nReset link sent. Message body withheld.`,
            priority: INTENT_PRIORITY.password_update,
            ticketId,
            sourceId: ctx.message.sourceId,
          },
          signal,
        ),
      { signal: ctx.signal },
    );

    return {
      kind: 'reply',
      body:
        `You can set a new password here: ${this.options.passwordResetUrl}\n\n` +
        'For your security, never send passwords by email. If you included one in your message, please change it now using the link above.',
      attachments: [],
    };
  }
}
