import { FeedbackEntity } from '../entities/feedback.entity';
import { FeedbackStats, FeedbackSummary } from '../interfaces/feedback.interface';
import { classifyRating } from './feedback-policy';

export type RatingRow = Pick<FeedbackEntity, 'rating' | 'disputed' | 'resolutionStatus'>;

export function summarizeRatings(rows: RatingRow[]): FeedbackStats {
  const stats: FeedbackStats = {
    total: rows.length,
    positive: 0,
    neutral: 0,
    negative: 0,
    average: 0,
    disputedPending: 0,
  };
  let sum = 0;

  for (const row of rows) {
    stats[classifyRating(row.rating)] += 1;
    sum += row.rating;
    if (row.disputed && row.resolutionStatus === null) {
      stats.disputedPending += 1;
    }
  }

  if (rows.length > 0) {
    stats.average = Math.round((sum / rows.length) * 10) / 10;
  }

  return stats;
}

export function toSummary(stats: FeedbackStats): FeedbackSummary {
  const { disputedPending: _disputedPending, ...summary } = stats;
  return summary;
}
