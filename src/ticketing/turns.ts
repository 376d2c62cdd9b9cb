import Ajv from 'ajv';
import { v4 as uuidv4 } from 'uuid';
import { AttachmentPointer, INTENT_LABELS, IntentLabel, Turn } from '../config/types';

export interface NewTurn {
  direction: Turn['direction'];
  messageId?: string;
  intent: IntentLabel;
  text: string;
  attachments?: readonly AttachmentPointer[];
  draftId?: string;
  timestamp?: number;
}

/** A turn as stored or sent over the wire; attachments may be omitted */
export type WireTurn = Omit<Turn, 'attachments'> & { attachments?: Turn['attachments'] };

export const TURN_SCHEMA = {
  type: 'object',
  required: ['turnId', 'direction', 'timestamp', 'intent', 'text'],
  properties: {
    turnId: { type: 'string' },
    direction: { enum: ['incoming', 'outgoing'] },
    timestamp: { type: 'number' },
    messageId: { type: 'string' },
    intent: { enum: [...INTENT_LABELS] },
    text: { type: 'string' },
    draftId: { type: 'string' },
    attachments: {
      type: 'array',
      items: {
        type: 'object',
        required: ['filename', 'uri'],
        properties: {
          filename: { type: 'string' },
          uri: { type: 'string' },
          mimeType: { type: 'string' },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
export const validateTurn = ajv.compile<WireTurn>(TURN_SCHEMA);

/** Build a frozen turn */
export function createTurn(input: NewTurn): Turn {
  return Object.freeze({
    turnId: uuidv4(),
    direction: input.direction,
    timestamp: input.timestamp ?? Date.now(),
    messageId: input.messageId,
    intent: input.intent,
    text: input.text,
    attachments: Object.freeze([...(input.attachments ?? [])]),
    draftId: input.draftId,
  });
}

/** Freeze a validated wire turn */
export function freezeTurn(turn: WireTurn): Turn {
  return Object.freeze({ ...turn, attachments: Object.freeze([...(turn.attachments ?? [])]) });
}

/** Two turns describe the same exchange when direction and message id match */
export function isSameTurn(a: Turn, b: Turn): boolean {
  if (a.turnId === b.turnId) return true;
  return a.messageId !== undefined && a.direction === b.direction && a.messageId === b.messageId;
}

/** Dedup key for a turn: direction plus the message it belongs to */
export function turnKey(turn: Turn): string {
  return turn.messageId ? `${turn.direction}:${turn.messageId}` : `turn:${turn.turnId}`;
}
