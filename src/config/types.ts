/** Intent labels the dispatch router knows how to handle */
export type IntentLabel =
  | 'bank_statement'
  | 'password_update'
  | 'general_query'
  | 'urgent_human'
  | 'fallback_human';

export const INTENT_LABELS: readonly IntentLabel[] = [
  'bank_statement',
  'password_update',
  'general_query',
  'urgent_human',
  'fallback_human',
];

export function isIntentLabel(value: string): value is IntentLabel {
  return INTENT_LABELS.some((label) => label === value);
}

/** Ticket status */
export type TicketStatus = 'open' | 'closed' | 'superseded';

export type TicketPriority = 'low' | 'medium' | 'high';

/** Human teams the notification channel can reach */
export type HumanTeam = 'escalations' | 'it_support' | 'finance' | 'general_support';

/** Raw event as delivered by the ingestion source (at-least-once, unordered) */
export interface InboundEvent {
  sourceId: string;
  rawPayload: unknown;
  receivedAt: number;
}

export interface AttachmentPointer {
  filename: string;
  uri: string;
  mimeType?: string;
}

/** One received email, parsed. Frozen once created. */
export interface ParsedMessage {
  readonly sourceId: string;
  readonly sender: string;
  readonly subject: string;
  readonly body: string;
  /** Ticket identifier found in subject/body, if any */
  readonly referenceToken?: string;
  readonly receivedAt: number;
  readonly attachments: readonly AttachmentPointer[];
}

/** One exchange unit within a ticket. Frozen once written. */
export interface Turn {
  readonly turnId: string;
  readonly direction: 'incoming' | 'outgoing';
  readonly timestamp: number;
  /** Incoming: the source message id. Outgoing: the source id being answered. */
  readonly messageId?: string;
  readonly intent: IntentLabel;
  readonly text: string;
  readonly attachments: readonly AttachmentPointer[];
  readonly draftId?: string;
}

export interface Ticket {
  id: string;
  status: TicketStatus;
  turns: Turn[];
  lastIntent: IntentLabel;
  priority: TicketPriority;
  sender: string;
  subject: string;
  /** Source message that created this ticket */
  externalRef?: string;
  tags?: string[];
  supersededBy?: string;
  createdAt: number;
  updatedAt: number;
}

/** Classifier output */
export interface Classification {
  intent: IntentLabel;
  confidence: number;
  entities: Record<string, unknown>;
  /** Label as the model produced it, before normalization */
  rawIntent: string;
  reasoning?: string;
}

/** Ticket priority by intent */
export const INTENT_PRIORITY: Record<IntentLabel, TicketPriority> = {
  urgent_human: 'high',
  password_update: 'medium',
  fallback_human: 'medium',
  bank_statement: 'low',
  general_query: 'low',
};

/** Team that owns each intent */
export const INTENT_TEAM: Record<IntentLabel, HumanTeam> = {
  urgent_human: 'escalations',
  fallback_human: 'escalations',
  password_update: 'it_support',
  bank_statement: 'finance',
  general_query: 'general_support',
};
