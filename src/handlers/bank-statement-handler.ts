import { IntentLabel } from '../config/types';
import { HandlerContext, HandlerOutcome, IntentHandler } from './types';
import { ReportGenerator } from '../reports/report-generator';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';

export const DEFAULT_STATEMENT_MONTHS = 3;
export const MAX_STATEMENT_MONTHS = 12;

/** Months requested, from the `months` entity; default 3, clamped to 1..12 */
export function statementMonths(entities: Record<string, unknown>): number {
  const raw = entities.months;
  const parsed = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(parsed)) return DEFAULT_STATEMENT_MONTHS;
  return Math.min(MAX_STATEMENT_MONTHS, Math.max(1, Math.trunc(parsed)));
}

export class BankStatementHandler implements IntentHandler {
  readonly intents: readonly IntentLabel[] = ['bank_statement'];

  constructor(
    private readonly reports: ReportGenerator,
    private readonly resilience: ResilienceWrapper,
  ) {}

  async handle(ctx: HandlerContext): Promise<HandlerOutcome> {
    const months = statementMonths(ctx.classification?.entities ?? {});

    const attachment = await this.resilience.invoke(
      'reports',
      (signal) =>
        this.reports.generateStatement(
          {
            accountHolder: ctx.message.sender,
            months,
            ticketId: ctx.handle?.ticket.id,
            asOf: ctx.message.receivedAt,
          },
          signal,
        ),
      { signal: ctx.signal },
    );

    ctx.log.info({ months, uri: attachment.uri }, 'Statement attached');
    const period = months === 1 ? 'the last month' : `the last ${months} months`;
    return {
      kind: 'reply',
      body: `Please find attached your account statement for ${period}.`,
      attachments: [attachment],
    };
  }
}
