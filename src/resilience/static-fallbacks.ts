/**
 * Static acknowledgments
 *
 * Sent when a message goes to a human team instead of an automated reply,
 * including when the classifier or a handler dependency is down.
 */

import { IntentLabel } from '../config/types';

const STATIC_ACKNOWLEDGMENTS = new Map<IntentLabel, string>([
  ['urgent_human', 'Thank you for your message. We have flagged it as urgent and a member of our escalations team will contact you shortly.'],

  ['bank_statement', 'Thank you for your request. We could not prepare your statement automatically, so our finance team will follow up with it by email.'],

  ['password_update', 'Thank you for contacting us. Our IT support team will help you with your account access. Please do not send passwords by email.'],

  ['general_query', 'Thank you for your question. A member of our support team will review it and reply as soon as possible.'],

  ['fallback_human', 'Thank you for your message. It has been forwarded to our support team and someone will get back to you shortly.'],
]);

export function getStaticAcknowledgment(intent: IntentLabel): string {
  return STATIC_ACKNOWLEDGMENTS.get(intent) ?? getDefaultAcknowledgment();
}

export function getDefaultAcknowledgment(): string {
  return 'Thank you for your message. We are experiencing a temporary issue, and a member of our support team will get back to you shortly.';
}
