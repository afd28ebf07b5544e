import { FeedbackEntity } from '../entities/feedback.entity';
import { Actor, FeedbackPayload } from '../interfaces/feedback.interface';
import {
  canDeleteFeedback,
  canDisputeFeedback,
  canEditFeedback,
  classifyRating,
} from './feedback-policy';

/**
 * Shapes a record for the viewer. The `can*` flags mirror the checks the
 * access layer applies to the matching mutations.
 */
export function presentFeedback(feedback: FeedbackEntity, viewer: Actor | null): FeedbackPayload {
  return {
    id: feedback.id,
    author: feedback.author
      ? {
          id: feedback.author.id,
          username: feedback.author.username,
          avatarTemplate: feedback.author.avatarTemplate,
        }
      : null,
    recipientId: feedback.recipientId,
    rating: feedback.rating,
    sentiment: classifyRating(feedback.rating),
    comment: feedback.comment,
    ticketNumber: feedback.ticketNumber,
    role: feedback.role,
    disputed: feedback.disputed,
    disputeReason: feedback.disputeReason,
    disputedAt: feedback.disputedAt,
    resolutionStatus: feedback.resolutionStatus,
    resolvedAt: feedback.resolvedAt,
    wasDisputed: feedback.wasDisputed,
    createdAt: feedback.createdAt,
    canEdit: canEditFeedback(viewer, feedback),
    canDelete: canDeleteFeedback(viewer, feedback),
    canDispute: canDisputeFeedback(viewer, feedback),
  };
}
