import { FeedbackSentiment } from '../constants/feedback.constants';
import { FeedbackEntity } from '../entities/feedback.entity';
import { Actor } from '../interfaces/feedback.interface';

type FeedbackParties = Pick<FeedbackEntity, 'authorId' | 'recipientId'>;
type DisputableFeedback = FeedbackParties & Pick<FeedbackEntity, 'disputed' | 'wasDisputed'>;

export interface FeedbackTarget {
  id: string;
  admin: boolean;
}

export function classifyRating(rating: number): FeedbackSentiment {
  if (rating >= 4) {
    return 'positive';
  }
  return rating === 3 ? 'neutral' : 'negative';
}

/**
 * Administrators cannot be rated and nobody rates themselves.
 */
export function canLeaveFeedback(viewer: Actor | null, target: FeedbackTarget): boolean {
  if (!viewer) {
    return false;
  }
  return viewer.id !== target.id && !target.admin;
}

export function canEditFeedback(viewer: Actor | null, feedback: FeedbackParties): boolean {
  if (!viewer) {
    return false;
  }
  return viewer.admin || feedback.authorId === viewer.id;
}

export function canDeleteFeedback(viewer: Actor | null, feedback: FeedbackParties): boolean {
  return canEditFeedback(viewer, feedback);
}

export function canDisputeFeedback(viewer: Actor | null, feedback: DisputableFeedback): boolean {
  if (!viewer || feedback.disputed || feedback.wasDisputed) {
    return false;
  }
  return feedback.recipientId === viewer.id;
}
