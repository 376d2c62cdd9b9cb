import { env } from '../config/env';
import { TicketBackend } from './types';
import { HelpdeskTicketBackend } from './helpdesk-ticketing';
import { InMemoryTicketBackend } from './in-memory-ticketing';
import { logger } from '../observability/logger';

/**
 * Factory: helpdesk REST backend when configured, in-memory otherwise.
 */
export function createTicketBackend(): TicketBackend {
  if (env.helpdesk.baseUrl && env.helpdesk.apiToken) {
    logger.info({ baseUrl: env.helpdesk.baseUrl }, 'Using helpdesk ticket backend');
    return new HelpdeskTicketBackend({ baseUrl: env.helpdesk.baseUrl, apiToken: env.helpdesk.apiToken });
  }

  logger.info('Using in-memory ticket backend (development mode)');
  return new InMemoryTicketBackend();
}
