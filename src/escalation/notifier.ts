import type { Logger } from 'pino';
import { HumanTeam } from '../config/types';
import { Notification, Notifier, SentNotification } from './types';
import { errorFromStatus } from '../resilience/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const PRIORITY_MARK: Record<Notification['priority'], string> = {
  high: ':rotating_light:',
  medium: ':warning:',
  low: ':information_source:',
};

/**
 * Slack-compatible incoming-webhook notifier. One webhook; the team is
 * carried in the message text so channel routing can happen on the Slack side.
 */
export class WebhookNotifier implements Notifier {
  private readonly log: Logger;

  constructor(private readonly webhookUrl: string) {
    this.log = logger.child({ component: 'webhook-notifier' });
  }

  async notify(team: HumanTeam, notification: Notification, signal?: AbortSignal): Promise<void> {
    const ticket = notification.ticketId ? ` (ticket ${notification.ticketId})` : '';
    const text = `${PRIORITY_MARK[notification.priority]} *[${team}]* ${notification.subject}${ticket}\n${notification.body}`;

    const res = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text }),
      signal,
    });

    if (!res.ok) {
      const errBody = await res.text();
      this.log.error({ status: res.status, team }, 'Notification webhook error');
      throw errorFromStatus('notifications', res.status, errBody);
    }

    this.log.info({ team, priority: notification.priority, ticketId: notification.ticketId }, 'Team notified');
  }
}

/**
 * Log-only notifier for development and tests. Keeps what it sent.
 */
export class LogNotifier implements Notifier {
  private readonly sent: SentNotification[] = [];
  private log = logger.child({ component: 'log-notifier' });

  async notify(team: HumanTeam, notification: Notification): Promise<void> {
    this.sent.push({ ...notification, team, sentAt: Date.now() });
    this.log.info({ team, priority: notification.priority, ticketId: notification.ticketId, subject: notification.subject }, '[LOG] Team notified');
  }

  /** Test helper: notifications sent so far */
  getSent(): SentNotification[] {
    return [...this.sent];
  }
}

export function createNotifier(): Notifier {
  if (env.notifications.slackWebhookUrl) {
    logger.info('Notifications: Slack-compatible webhook');
    return new WebhookNotifier(env.notifications.slackWebhookUrl);
  }
  logger.info('Notifications: log only');
  return new LogNotifier();
}
