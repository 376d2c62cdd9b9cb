import Ajv from 'ajv';
import { LLMProvider } from './types';
import { PromptLibrary } from './prompt-library';
import { parseJsonOutput } from './json-output';
import { PermanentDependencyError } from '../resilience/errors';

export interface ComposeRequest {
  question: string;
  /** Knowledge base excerpts, most relevant first */
  excerpts: string[];
  signal?: AbortSignal;
}

export interface ComposedReply {
  reply: string;
  /** False when the excerpts did not answer the question */
  answered: boolean;
}

export interface ReplyComposer {
  compose(request: ComposeRequest): Promise<ComposedReply>;
}

const REPLY_SCHEMA = {
  type: 'object',
  required: ['reply', 'answered'],
  properties: {
    reply: { type: 'string', minLength: 1 },
    answered: { type: 'boolean' },
  },
};

const ajv = new Ajv();
const validateReply = ajv.compile<ComposedReply>(REPLY_SCHEMA);

/** Grounded answer to a general query, written by the LLM from knowledge excerpts */
export class LlmReplyComposer implements ReplyComposer {
  constructor(
    private readonly provider: LLMProvider,
    private readonly prompts: PromptLibrary,
  ) {}

  async compose(request: ComposeRequest): Promise<ComposedReply> {
    const excerpts = request.excerpts.map((e, i) => `[${i + 1}] ${e}`).join('\n\n');
    const response = await this.provider.complete({
      messages: [
        { role: 'system', content: this.prompts.get('reply') },
        { role: 'user', content: `Question:\n${request.question}\n\nKnowledge base excerpts:\n${excerpts || '(none)'}` },
      ],
      jsonMode: true,
      signal: request.signal,
    });

    let data: unknown;
    try {
      data = parseJsonOutput(response.content);
    } catch (err) {
      throw new PermanentDependencyError('composer', 'Reply composer returned non-JSON output', { cause: err });
    }
    if (!validateReply(data)) {
      throw new PermanentDependencyError('composer', 'Reply composer output violates contract');
    }
    return { reply: data.reply.trim(), answered: data.answered };
  }
}
