import { Ticket, TicketPriority } from '../config/types';

export type EscalationLevel = 'level_1' | 'level_2' | 'level_3' | 'urgent' | 'manager';

export type EscalationReason = 'response_time' | 'urgency' | 'complexity';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/** Longest a ticket may sit without activity at each level */
export const MAX_RESPONSE_MS: Record<EscalationLevel, number> = {
  level_1: 4 * HOUR_MS,
  level_2: 2 * HOUR_MS,
  level_3: 1 * HOUR_MS,
  urgent: 30 * MINUTE_MS,
  manager: 15 * MINUTE_MS,
};

const COMPLEX_INTERACTION_COUNT = 5;
const TECHNICAL_KEYWORDS = ['error', 'bug', 'crash', 'broken', 'not working'];

/** What the rules look at, taken from a ticket */
export interface EscalationSubject {
  priority: TicketPriority;
  lastActivityAt: number;
  interactionCount: number;
  text: string;
}

export type EscalationCheck =
  | { needed: false }
  | { needed: true; reason: EscalationReason; target: EscalationLevel; detail: string };

const NEXT_LEVEL: Record<EscalationLevel, EscalationLevel> = {
  level_1: 'level_2',
  level_2: 'level_3',
  level_3: 'manager',
  urgent: 'manager',
  manager: 'manager',
};

export function nextLevel(level: EscalationLevel): EscalationLevel {
  return NEXT_LEVEL[level];
}

export function subjectFromTicket(ticket: Ticket): EscalationSubject {
  const firstIncoming = ticket.turns.find((t) => t.direction === 'incoming');
  return {
    priority: ticket.priority,
    lastActivityAt: ticket.updatedAt,
    interactionCount: ticket.turns.length,
    text: `${ticket.subject} ${firstIncoming?.text ?? ''}`,
  };
}

/**
 * Rules in order: response time, then urgency, then complexity. The first
 * that fires wins. Manager is the ceiling; urgency never moves a ticket down.
 */
export function checkEscalationNeeded(subject: EscalationSubject, current: EscalationLevel, now: number): EscalationCheck {
  const idleMs = now - subject.lastActivityAt;
  if (idleMs > MAX_RESPONSE_MS[current] && current !== 'manager') {
    return {
      needed: true,
      reason: 'response_time',
      target: nextLevel(current),
      detail: `no activity for ${Math.floor(idleMs / MINUTE_MS)} min`,
    };
  }

  if (subject.priority === 'high' && current !== 'urgent' && current !== 'manager') {
    return { needed: true, reason: 'urgency', target: 'urgent', detail: 'high priority ticket' };
  }

  if (current === 'level_1') {
    if (subject.interactionCount > COMPLEX_INTERACTION_COUNT) {
      return { needed: true, reason: 'complexity', target: 'level_2', detail: `${subject.interactionCount} interactions` };
    }
    const text = subject.text.toLowerCase();
    const keyword = TECHNICAL_KEYWORDS.find((k) => text.includes(k));
    if (keyword) {
      return { needed: true, reason: 'complexity', target: 'level_2', detail: `technical issue: "${keyword}"` };
    }
  }

  return { needed: false };
}
