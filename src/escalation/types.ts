import { HumanTeam, TicketPriority } from '../config/types';

export interface Notification {
  subject: string;
  body: string;
  priority: TicketPriority;
  ticketId?: string;
  sourceId?: string;
}

export interface SentNotification extends Notification {
  team: HumanTeam;
  sentAt: number;
}

/** Channel to the human teams */
export interface Notifier {
  notify(team: HumanTeam, notification: Notification, signal?: AbortSignal): Promise<void>;
}
