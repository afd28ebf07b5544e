export const FEEDBACK_ROUTE_PREFIX = 'deald-feedback';

export const FEEDBACK_RATING_MIN = 1;
export const FEEDBACK_RATING_MAX = 5;
export const FEEDBACK_COMMENT_MAX_LENGTH = 1000;

export enum FeedbackRole {
  Buyer = 'buyer',
  Seller = 'seller',
}

export enum ResolutionStatus {
  Accepted = 'accepted',
  Rejected = 'rejected',
}

export type FeedbackSentiment = 'positive' | 'neutral' | 'negative';

const FEEDBACK_ROLES: readonly string[] = Object.values(FeedbackRole);

function isFeedbackRole(value: string): value is FeedbackRole {
  return FEEDBACK_ROLES.includes(value);
}

/**
 * Unknown roles fall back to buyer instead of being rejected.
 */
export function normalizeFeedbackRole(value: unknown): FeedbackRole {
  const role = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return isFeedbackRole(role) ? role : FeedbackRole.Buyer;
}
