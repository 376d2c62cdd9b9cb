import Ajv from 'ajv';
import { AttachmentPointer, InboundEvent, ParsedMessage } from '../config/types';
import { extractReferenceToken } from '../ticketing/reference-token';

export interface EmailPayload {
  from: string;
  subject?: string;
  body?: string;
  date?: string;
  attachments?: AttachmentPointer[];
}

export type ParseResult = { ok: true; message: ParsedMessage } | { ok: false; reason: string };

const EMAIL_PAYLOAD_SCHEMA = {
  type: 'object',
  required: ['from'],
  anyOf: [{ required: ['subject'] }, { required: ['body'] }],
  properties: {
    from: { type: 'string', minLength: 3 },
    subject: { type: 'string' },
    body: { type: 'string' },
    date: { type: 'string' },
    attachments: {
      type: 'array',
      items: {
        type: 'object',
        required: ['filename', 'uri'],
        properties: {
          filename: { type: 'string', minLength: 1 },
          uri: { type: 'string', minLength: 1 },
          mimeType: { type: 'string' },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validatePayload = ajv.compile<EmailPayload>(EMAIL_PAYLOAD_SCHEMA);

const BASE64_RE = /^[A-Za-z0-9+/_-]+={0,2}$/;

/** Object, JSON text, or base64 of JSON text (push-notification style) */
function decodePayload(raw: unknown): { ok: true; value: unknown } | { ok: false; reason: string } {
  if (typeof raw !== 'string') return { ok: true, value: raw };

  const text = raw.trim();
  if (text.startsWith('{')) {
    try {
      return { ok: true, value: JSON.parse(text) };
    } catch {
      return { ok: false, reason: 'payload is not valid JSON' };
    }
  }

  if (!BASE64_RE.test(text)) return { ok: false, reason: 'payload is neither JSON nor base64' };
  try {
    return { ok: true, value: JSON.parse(Buffer.from(text, 'base64url').toString('utf-8')) };
  } catch {
    return { ok: false, reason: 'base64 payload does not decode to JSON' };
  }
}

/** "Jane Doe <jane@example.com>" → "jane@example.com" */
export function senderAddress(from: string): string {
  const match = /<([^>]+)>/.exec(from);
  return (match ? match[1] : from).trim().toLowerCase();
}

/**
 * Turn an ingestion event into a frozen ParsedMessage.
 * Never throws: malformed input comes back as `{ ok: false, reason }`.
 */
export function parseEmailPayload(event: InboundEvent): ParseResult {
  const decoded = decodePayload(event.rawPayload);
  if (!decoded.ok) return decoded;

  const payload = decoded.value;
  if (!validatePayload(payload)) {
    const reason = ajv.errorsText(validatePayload.errors, { dataVar: 'payload' });
    return { ok: false, reason };
  }

  const sender = senderAddress(payload.from);
  if (!sender.includes('@')) return { ok: false, reason: `sender "${payload.from}" has no address` };

  const subject = (payload.subject ?? '').trim();
  const body = (payload.body ?? '').trim();
  if (!subject && !body) return { ok: false, reason: 'email has neither subject nor body' };

  const attachments = (payload.attachments ?? []).map((a) => Object.freeze({ ...a }));

  const message: ParsedMessage = Object.freeze({
    sourceId: event.sourceId,
    sender,
    subject,
    body,
    referenceToken: extractReferenceToken(subject, body),
    receivedAt: event.receivedAt,
    attachments: Object.freeze(attachments),
  });
  return { ok: true, message };
}
