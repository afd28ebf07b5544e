import { FeedbackRole, FeedbackSentiment, ResolutionStatus } from '../constants/feedback.constants';
import { FeedbackEntity } from '../entities/feedback.entity';

/**
 * The identity an operation runs on behalf of. Passed explicitly to every
 * access-layer call; `null` stands for an anonymous viewer.
 */
export interface Actor {
  id: string;
  username: string;
  admin: boolean;
}

export interface CreateFeedbackInput {
  authorId: string;
  recipientId: string;
  rating: number;
  comment?: string | null;
  ticketNumber: string;
  role?: unknown;
}

export type DisputeResult =
  | { filed: true; feedback: FeedbackEntity }
  | { filed: false; feedback: FeedbackEntity };

export type ResolveResult =
  | { status: ResolutionStatus.Accepted; deleted: true }
  | { status: ResolutionStatus.Rejected; feedback: FeedbackEntity };

export interface FeedbackSummary {
  total: number;
  positive: number;
  neutral: number;
  negative: number;
  average: number;
}

export interface FeedbackStats extends FeedbackSummary {
  disputedPending: number;
}

export interface FeedbackAuthorPayload {
  id: string;
  username: string;
  avatarTemplate: string | null;
}

export interface FeedbackPayload {
  id: string;
  author: FeedbackAuthorPayload | null;
  recipientId: string;
  rating: number;
  sentiment: FeedbackSentiment;
  comment: string | null;
  ticketNumber: string;
  role: FeedbackRole;
  disputed: boolean;
  disputeReason: string | null;
  disputedAt: Date | null;
  resolutionStatus: ResolutionStatus | null;
  resolvedAt: Date | null;
  wasDisputed: boolean;
  createdAt: Date;
  canEdit: boolean;
  canDelete: boolean;
  canDispute: boolean;
}
