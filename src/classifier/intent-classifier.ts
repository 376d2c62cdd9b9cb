import type { Logger } from 'pino';
import { Classification, ParsedMessage, Turn } from '../config/types';
import { LLMMessage, LLMProvider } from '../llm/types';
import { PromptLibrary } from '../llm/prompt-library';
import { parseClassification } from './classification-contract';
import { PermanentDependencyError } from '../resilience/errors';
import { logger } from '../observability/logger';

const MAX_BODY_CHARS = 8_000;
const MAX_HISTORY_CHARS = 300;

export interface IntentClassifier {
  classify(message: ParsedMessage, context: readonly Turn[], signal?: AbortSignal): Promise<Classification>;
}

/**
 * LLM-backed classifier. One completion per call; retries and deadlines
 * belong to the resilience wrapper around it.
 */
export class LlmIntentClassifier implements IntentClassifier {
  private readonly log: Logger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly prompts: PromptLibrary,
  ) {
    this.log = logger.child({ component: 'intent-classifier', provider: provider.name });
  }

  async classify(message: ParsedMessage, context: readonly Turn[], signal?: AbortSignal): Promise<Classification> {
    const response = await this.provider.complete({
      messages: this.buildMessages(message, context),
      jsonMode: true,
      signal,
    });

    const classification = parseClassification(response.content);
    this.log.info(
      {
        sourceId: message.sourceId,
        intent: classification.intent,
        rawIntent: classification.rawIntent,
        confidence: classification.confidence,
        latencyMs: response.latencyMs,
      },
      'Message classified',
    );
    return classification;
  }

  private buildMessages(message: ParsedMessage, context: readonly Turn[]): LLMMessage[] {
    const messages: LLMMessage[] = [{ role: 'system', content: this.prompts.get('classifier') }];

    const email = [
      `From: ${message.sender}`,
      `Subject: ${message.subject}`,
      '',
      message.body.slice(0, MAX_BODY_CHARS),
    ].join('\n');

    if (context.length > 0) {
      const history = context
        .map((t) => `- [${t.direction}, ${t.intent}] ${t.text.slice(0, MAX_HISTORY_CHARS)}`)
        .join('\n');
      messages.push({ role: 'user', content: `${email}\n\nEarlier turns on this ticket:\n${history}` });
    } else {
      messages.push({ role: 'user', content: email });
    }

    return messages;
  }
}

/** Stand-in when no LLM provider is configured: every email takes the fallback path */
export class UnconfiguredClassifier implements IntentClassifier {
  async classify(): Promise<Classification> {
    throw new PermanentDependencyError('classifier', 'No LLM provider configured');
  }
}
