export interface FAQEntry {
  question: string;
  answer: string;
  tags: string[];
  category: string;
}

export interface PolicyEntry {
  id: string;
  title: string;
  content: string;
}

export interface KnowledgeSearchResult {
  type: 'faq' | 'policy';
  content: string;
  score: number;
  source: string;
}

/** Knowledge store contract as the handlers see it */
export interface KnowledgeStore {
  search(query: string, limit: number, signal?: AbortSignal): Promise<KnowledgeSearchResult[]>;
}

export interface KnowledgeStats {
  faqCount: number;
  documentCount: number;
  stopWordCount: number;
}

/**
 * Knowledge store with runtime document management. Documents share the
 * policy shape; runtime changes last until the next `loadAll`.
 */
export interface ManagedKnowledgeStore extends KnowledgeStore {
  /** Returns false when a document with the same id already exists */
  addDocument(doc: PolicyEntry): Promise<boolean>;
  updateDocument(id: string, changes: Partial<Omit<PolicyEntry, 'id'>>): Promise<PolicyEntry | null>;
  deleteDocument(id: string): Promise<boolean>;
  stats(): Promise<KnowledgeStats>;
}
