import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { FAQEntry, KnowledgeSearchResult, KnowledgeStats, ManagedKnowledgeStore, PolicyEntry } from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/knowledge/ or src/knowledge/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const KNOWLEDGE_DIR = path.resolve(PROJECT_ROOT, 'knowledge');

const MIN_SCORE = 0.3;

const ajv = new Ajv({ allErrors: true });

const validateFaq = ajv.compile<FAQEntry[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['question', 'answer', 'tags', 'category'],
    properties: {
      question: { type: 'string' },
      answer: { type: 'string' },
      tags: { type: 'array', items: { type: 'string' } },
      category: { type: 'string' },
    },
  },
});

const validatePolicies = ajv.compile<PolicyEntry[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'title', 'content'],
    properties: {
      id: { type: 'string' },
      title: { type: 'string' },
      content: { type: 'string' },
    },
  },
});

const validateStopWords = ajv.compile<string[]>({ type: 'array', items: { type: 'string' } });

/**
 * Keyword search over the YAML knowledge base (knowledge/faq.yaml, knowledge/policies.yaml).
 * Policy documents can be added, edited and removed at runtime; a reload restores the files.
 */
export class KnowledgeService implements ManagedKnowledgeStore {
  private faq: FAQEntry[] = [];
  private documents = new Map<string, PolicyEntry>();
  private stopWords = new Set<string>();
  private log = logger.child({ component: 'knowledge' });

  constructor(private readonly dir: string = KNOWLEDGE_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    const faq = this.loadYAML('faq.yaml');
    this.faq = validateFaq(faq) ? faq : this.rejectFile('faq.yaml', faq);

    const policies = this.loadYAML('policies.yaml');
    const entries = validatePolicies(policies) ? policies : this.rejectFile('policies.yaml', policies);
    this.documents = new Map(entries.map((entry) => [entry.id, entry]));

    const stopWords = this.loadJSON('stop-words.json');
    this.stopWords = new Set(validateStopWords(stopWords) ? stopWords : this.rejectFile('stop-words.json', stopWords));

    logger.info(
      { faqCount: this.faq.length, policyCount: this.documents.size, stopWordCount: this.stopWords.size },
      'Knowledge base loaded',
    );
  }

  /**
   * Keyword-based search with stop-word filtering.
   * Tag matches weigh more than body matches.
   */
  async search(query: string, limit: number = 5): Promise<KnowledgeSearchResult[]> {
    const rawTerms = query.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
    const terms = this.filterStopWords(rawTerms);
    const results: KnowledgeSearchResult[] = [];

    for (const entry of this.faq) {
      const tagText = entry.tags.join(' ').toLowerCase();
      const text = `${entry.question} ${entry.answer} ${tagText}`.toLowerCase();
      const score = this.scoreText(text, terms, tagText);
      if (score > MIN_SCORE) {
        results.push({
          type: 'faq',
          content: `Q: ${entry.question}\nA: ${entry.answer}`,
          score,
          source: `faq/${entry.category}`,
        });
      }
    }

    for (const entry of this.documents.values()) {
      const text = `${entry.title} ${entry.content}`.toLowerCase();
      const score = this.scoreText(text, terms);
      if (score > MIN_SCORE) {
        results.push({
          type: 'policy',
          content: `Policy: ${entry.title}\n${entry.content}`,
          score,
          source: `policy/${entry.id}`,
        });
      }
    }

    return results.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  // ───── Document Management ─────

  async addDocument(doc: PolicyEntry): Promise<boolean> {
    if (this.documents.has(doc.id)) {
      this.log.warn({ documentId: doc.id }, 'Document already exists; not added');
      return false;
    }
    this.documents.set(doc.id, { id: doc.id, title: doc.title, content: doc.content });
    this.log.info({ documentId: doc.id }, 'Document added');
    return true;
  }

  async updateDocument(id: string, changes: Partial<Omit<PolicyEntry, 'id'>>): Promise<PolicyEntry | null> {
    const current = this.documents.get(id);
    if (!current) return null;
    const updated: PolicyEntry = {
      id,
      title: changes.title ?? current.title,
      content: changes.content ?? current.content,
    };
    this.documents.set(id, updated);
    this.log.info({ documentId: id }, 'Document updated');
    return { ...updated };
  }

  async deleteDocument(id: string): Promise<boolean> {
    const removed = this.documents.delete(id);
    if (removed) this.log.info({ documentId: id }, 'Document deleted');
    return removed;
  }

  async stats(): Promise<KnowledgeStats> {
    return { faqCount: this.faq.length, documentCount: this.documents.size, stopWordCount: this.stopWords.size };
  }

  /**
   * Filter stop words from query terms while preserving meaningful words.
   * If ALL terms are stop words (e.g. "what is it"), fall back to original terms.
   */
  private filterStopWords(terms: string[]): string[] {
    const meaningful = terms.filter((t) => !this.stopWords.has(t) && t.length > 1);
    return meaningful.length > 0 ? meaningful : terms;
  }

  private scoreText(text: string, terms: string[], tagText?: string): number {
    if (terms.length === 0) return 0;
    let score = 0;
    for (const term of terms) {
      if (text.includes(term)) {
        score += 1;
        if (tagText && tagText.includes(term)) score += 0.5;
      }
    }
    return score / terms.length;
  }

  private loadYAML(filename: string): unknown {
    const content = this.readFile(filename);
    return content === null ? [] : yaml.load(content);
  }

  private loadJSON(filename: string): unknown {
    const content = this.readFile(filename);
    return content === null ? [] : JSON.parse(content);
  }

  private readFile(filename: string): string | null {
    const filepath = path.join(this.dir, filename);
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Knowledge file not found');
      return null;
    }
    return fs.readFileSync(filepath, 'utf-8');
  }

  private rejectFile(filename: string, data: unknown): never[] {
    logger.error({ filename, kind: typeof data }, 'Knowledge file has unexpected shape; ignoring');
    return [];
  }
}
