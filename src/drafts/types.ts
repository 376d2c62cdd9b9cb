import { AttachmentPointer } from '../config/types';

export type DraftStatus = 'draft' | 'approved' | 'sent' | 'discarded';

export interface DraftRequest {
  ticketId?: string;
  to: string;
  subject: string;
  body: string;
  attachments: readonly AttachmentPointer[];
  /** Inbound message this draft answers; drafts are unique per source message */
  sourceMessageId: string;
}

export interface Draft extends DraftRequest {
  id: string;
  status: DraftStatus;
  createdAt: number;
  updatedAt: number;
}

/** Outgoing side of the pipeline: one draft per answered message */
export interface DraftCreator {
  createDraft(request: DraftRequest, signal?: AbortSignal): Promise<string>;
}

export interface DraftFilter {
  status?: DraftStatus;
  ticketId?: string;
}

/** Review surface for drafts awaiting a human */
export interface DraftStore extends DraftCreator {
  get(draftId: string): Promise<Draft | null>;
  list(filter?: DraftFilter): Promise<Draft[]>;
  updateStatus(draftId: string, status: DraftStatus): Promise<Draft>;
  delete(draftId: string): Promise<boolean>;
  /** Removes drafts created before `cutoff` (epoch ms); returns how many went */
  cleanupOlderThan(cutoff: number): Promise<number>;
}
