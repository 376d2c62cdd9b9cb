import { v4 as uuidv4 } from 'uuid';
import { Draft, DraftFilter, DraftRequest, DraftStatus, DraftStore } from './types';
import { PermanentDependencyError } from '../resilience/errors';
import { logger } from '../observability/logger';

/** Allowed review transitions; `sent` and `discarded` are final */
const DRAFT_TRANSITIONS: Record<DraftStatus, readonly DraftStatus[]> = {
  draft: ['approved', 'discarded'],
  approved: ['sent', 'discarded', 'draft'],
  sent: [],
  discarded: [],
};

/**
 * In-memory draft store. `createDraft` is idempotent on the source message id,
 * so a retried creation returns the draft made by the first attempt.
 */
export class InMemoryDraftStore implements DraftStore {
  private drafts: Map<string, Draft> = new Map();
  private bySource: Map<string, string> = new Map();
  private log = logger.child({ component: 'draft-store' });

  async createDraft(request: DraftRequest): Promise<string> {
    const existing = this.bySource.get(request.sourceMessageId);
    if (existing) {
      this.log.info({ draftId: existing, sourceId: request.sourceMessageId }, 'Draft already exists for message');
      return existing;
    }

    const now = Date.now();
    const draft: Draft = {
      ...request,
      attachments: [...request.attachments],
      id: uuidv4(),
      status: 'draft',
      createdAt: now,
      updatedAt: now,
    };
    this.drafts.set(draft.id, draft);
    this.bySource.set(request.sourceMessageId, draft.id);

    this.log.info({ draftId: draft.id, ticketId: request.ticketId, to: request.to }, 'Draft created');
    return draft.id;
  }

  async get(draftId: string): Promise<Draft | null> {
    const draft = this.drafts.get(draftId);
    return draft ? { ...draft } : null;
  }

  async list(filter: DraftFilter = {}): Promise<Draft[]> {
    return Array.from(this.drafts.values())
      .filter((d) => (filter.status ? d.status === filter.status : true))
      .filter((d) => (filter.ticketId ? d.ticketId === filter.ticketId : true))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((d) => ({ ...d }));
  }

  async updateStatus(draftId: string, status: DraftStatus): Promise<Draft> {
    const draft = this.drafts.get(draftId);
    if (!draft) {
      throw new PermanentDependencyError('drafts', `Draft ${draftId} not found`);
    }
    if (draft.status !== status && !DRAFT_TRANSITIONS[draft.status].includes(status)) {
      throw new PermanentDependencyError('drafts', `Draft ${draftId} cannot move from ${draft.status} to ${status}`);
    }
    draft.status = status;
    draft.updatedAt = Date.now();
    this.log.info({ draftId, status }, 'Draft status updated');
    return { ...draft };
  }

  async delete(draftId: string): Promise<boolean> {
    const draft = this.drafts.get(draftId);
    if (!draft) return false;
    this.remove(draft);
    this.log.info({ draftId }, 'Draft deleted');
    return true;
  }

  async cleanupOlderThan(cutoff: number): Promise<number> {
    const stale = Array.from(this.drafts.values()).filter((d) => d.createdAt < cutoff);
    for (const draft of stale) this.remove(draft);
    if (stale.length > 0) this.log.info({ removed: stale.length, cutoff }, 'Old drafts cleaned up');
    return stale.length;
  }

  private remove(draft: Draft): void {
    this.drafts.delete(draft.id);
    this.bySource.delete(draft.sourceMessageId);
  }
}
