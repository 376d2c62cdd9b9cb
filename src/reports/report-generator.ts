import { v4 as uuidv4 } from 'uuid';
import { AttachmentPointer } from '../config/types';
import { logger } from '../observability/logger';

export interface StatementRequest {
  /** Registered address the statement belongs to */
  accountHolder: string;
  months: number;
  ticketId?: string;
  /** Statement period ends here */
  asOf: number;
}

export interface ReportGenerator {
  generateStatement(request: StatementRequest, signal?: AbortSignal): Promise<AttachmentPointer>;
}

/**
 * Records statement requests and hands back a pointer under `uriPrefix`;
 * rendering happens in the document service that owns that location.
 */
export class InMemoryReportGenerator implements ReportGenerator {
  private readonly generated: Array<StatementRequest & { pointer: AttachmentPointer }> = [];
  private log = logger.child({ component: 'report-generator' });

  constructor(private readonly uriPrefix: string = 'reports://statements') {}

  async generateStatement(request: StatementRequest): Promise<AttachmentPointer> {
    const end = new Date(request.asOf).toISOString().slice(0, 7);
    const pointer: AttachmentPointer = {
      filename: `statement-${request.months}m-${end}.pdf`,
      uri: `${this.uriPrefix}/${uuidv4()}.pdf`,
      mimeType: 'application/pdf',
    };
    this.generated.push({ ...request, pointer });
    this.log.info({ months: request.months, ticketId: request.ticketId, uri: pointer.uri }, 'Statement generated');
    return pointer;
  }

  /** Test helper */
  getGenerated(): Array<StatementRequest & { pointer: AttachmentPointer }> {
    return [...this.generated];
  }
}
