import { IntentLabel } from '../config/types';
import { HandlerContext, HandlerOutcome, IntentHandler } from './types';
import { KnowledgeStore } from '../knowledge/types';
import { ReplyComposer } from '../llm/reply-composer';
import { ResilienceWrapper } from '../resilience/resilience-wrapper';

export interface GeneralQueryOptions {
  resultLimit: number;
}

/**
 * Answers from the knowledge base. With a composer the excerpts are turned into
 * prose; without one the best matches are quoted. No match means escalation.
 */
export class GeneralQueryHandler implements IntentHandler {
  readonly intents: readonly IntentLabel[] = ['general_query'];

  constructor(
    private readonly knowledge: KnowledgeStore,
    private readonly resilience: ResilienceWrapper,
    private readonly options: GeneralQueryOptions,
    private readonly composer: ReplyComposer | null = null,
  ) {}

  async handle(ctx: HandlerContext): Promise<HandlerOutcome> {
    const question = [ctx.message.subject, ctx.message.body].filter(Boolean).join('\n');

    const results = await this.resilience.invoke(
      'knowledge',
      (signal) => this.knowledge.search(question, this.options.resultLimit, signal),
      { signal: ctx.signal },
    );

    if (results.length === 0) {
      return { kind: 'escalate', reason: 'no knowledge base match' };
    }

    if (!this.composer) {
      const quoted = results.map((r) => r.content).join('\n\n');
      return {
        kind: 'reply',
        body: `Here is what we found that may help:\n\n${quoted}\n\nIf this does not answer your question, just reply to this email.`,
        attachments: [],
      };
    }

    const composer = this.composer;
    const composed = await this.resilience.invoke(
      'composer',
      (signal) => composer.compose({ question, excerpts: results.map((r) => r.content), signal }),
      { signal: ctx.signal },
    );

    if (!composed.answered) {
      return { kind: 'escalate', reason: 'knowledge base did not answer the question' };
    }
    return { kind: 'reply', body: composed.reply, attachments: [] };
  }
}
