/**
 * Ticket reference tokens in inbound mail, in priority order.
 * Each pattern is tried against the subject followed by the body.
 */
const REFERENCE_PATTERNS: readonly RegExp[] = [
  /\[TICKET-(\d+)\]/i,
  /#(\d+)/,
  /Ticket:\s*(\d+)/i,
  /ID:\s*(\d+)/i,
];

export function extractReferenceToken(subject: string, body: string): string | undefined {
  const text = `${subject} ${body}`;
  for (const pattern of REFERENCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[1];
  }
  return undefined;
}

/** Token placed in outgoing subjects so replies thread back to the ticket */
export function formatReferenceToken(ticketId: string): string {
  return `[TICKET-${ticketId}]`;
}
