import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/llm/ or src/llm/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

export type PromptName = 'classifier' | 'reply';

const PROMPT_NAMES: readonly PromptName[] = ['classifier', 'reply'];

const BUILT_IN: Record<PromptName, string> = {
  classifier:
    'Classify the email into one of: bank_statement, password_update, general_query, urgent_human, fallback_human. ' +
    'Respond with JSON: {"intent": string, "confidence": number, "entities": object, "reasoning": string}',
  reply:
    'Answer the question using only the provided excerpts. Respond with JSON: {"reply": string, "answered": boolean}',
};

/**
 * Prompt texts loaded once from prompts/*.md, with built-in fallbacks.
 */
export class PromptLibrary {
  private prompts = new Map<PromptName, string>();

  constructor(private readonly dir: string = PROMPTS_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.prompts.clear();
    for (const name of PROMPT_NAMES) {
      const filepath = path.join(this.dir, `${name}.md`);
      if (!fs.existsSync(filepath)) {
        logger.warn({ filepath }, 'Prompt file not found; using built-in prompt');
        this.prompts.set(name, BUILT_IN[name]);
        continue;
      }
      this.prompts.set(name, fs.readFileSync(filepath, 'utf-8').trim());
    }
  }

  get(name: PromptName): string {
    return this.prompts.get(name) ?? BUILT_IN[name];
  }
}
