import { Turn } from '../config/types';

/**
 * Per-ticket turn history used as classifier and handler context.
 * One writer per ticket (its lane); readers get snapshots.
 */
export interface ConversationMemory {
  /** Append in order. A turn whose (direction, messageId) is already stored is ignored. */
  append(ticketId: string, turn: Turn): Promise<void>;
  /** Up to `maxTurns` most recent turns, oldest first */
  recentContext(ticketId: string, maxTurns: number): Promise<Turn[]>;
  clear(ticketId: string): Promise<void>;
}
