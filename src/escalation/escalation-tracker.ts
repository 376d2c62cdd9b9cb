import { Ticket } from '../config/types';
import { Notifier } from './types';
import { EscalationLevel, EscalationReason, checkEscalationNeeded, subjectFromTicket } from './escalation-policy';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';
import { logger } from '../observability/logger';
import { escalations } from '../observability/metrics';

export interface EscalationRecord {
  ticketId: string;
  from: EscalationLevel;
  to: EscalationLevel;
  reason: EscalationReason;
  detail: string;
  at: number;
}

export interface EscalationSummary {
  total: number;
  byLevel: Partial<Record<EscalationLevel, number>>;
  byReason: Partial<Record<EscalationReason, number>>;
}

/**
 * Per-ticket escalation level and history. Tickets start at level_1.
 * A level only changes once the escalations team has been notified.
 */
export class EscalationTracker {
  private levels = new Map<string, EscalationLevel>();
  private history = new Map<string, EscalationRecord[]>();
  private log = logger.child({ component: 'escalation' });

  constructor(
    private readonly notifier: Notifier,
    private readonly resilience: ResilienceWrapper,
    private readonly now: () => number = Date.now,
  ) {}

  levelOf(ticketId: string): EscalationLevel {
    return this.levels.get(ticketId) ?? 'level_1';
  }

  historyOf(ticketId: string): EscalationRecord[] {
    return [...(this.history.get(ticketId) ?? [])];
  }

  /** Runs the escalation rules against a ticket; closed tickets are left alone */
  async review(ticket: Ticket, signal?: AbortSignal): Promise<EscalationRecord | null> {
    if (ticket.status !== 'open') return null;

    const from = this.levelOf(ticket.id);
    const at = this.now();
    const check = checkEscalationNeeded(subjectFromTicket(ticket), from, at);
    if (!check.needed) return null;

    const record: EscalationRecord = { ticketId: ticket.id, from, to: check.target, reason: check.reason, detail: check.detail, at };
    const urgent = record.to === 'urgent' || record.to === 'manager';

    await this.resilience.invoke(
      'notifications',
      (s) =>
        this.notifier.notify(
          'escalations',
          {
            subject: `Ticket ${ticket.id} escalated to ${record.to}`,
            body: `Reason: ${record.reason} (${record.detail})\nFrom: ${ticket.sender}\nSubject: ${ticket.subject || '(no subject)'}`,
            priority: urgent ? 'high' : 'medium',
            ticketId: ticket.id,
          },
          s,
        ),
      { signal },
    );

    this.levels.set(ticket.id, record.to);
    this.history.set(ticket.id, [...this.historyOf(ticket.id), record]);
    escalations.inc({ level: record.to, reason: record.reason });
    this.log.info({ ticketId: ticket.id, from, to: record.to, reason: record.reason }, 'Ticket escalated');
    return record;
  }

  summary(): EscalationSummary {
    const result: EscalationSummary = { total: 0, byLevel: {}, byReason: {} };
    for (const records of this.history.values()) {
      for (const r of records) {
        result.total++;
        result.byLevel[r.to] = (result.byLevel[r.to] ?? 0) + 1;
        result.byReason[r.reason] = (result.byReason[r.reason] ?? 0) + 1;
      }
    }
    return result;
  }
}
