import { Injectable, Logger } from '@nestjs/common';
import { UsersService } from '../../users/services/users.service';
import { FeedbackRole, ResolutionStatus } from '../constants/feedback.constants';
import {
  ALREADY_DISPUTED_MESSAGE,
  FeedbackAuthorizationError,
  FeedbackDisputeStateError,
} from '../errors/feedback.errors';
import {
  Actor,
  FeedbackPayload,
  FeedbackStats,
  FeedbackSummary,
} from '../interfaces/feedback.interface';
import { canDeleteFeedback, canLeaveFeedback } from '../utils/feedback-policy';
import { presentFeedback } from '../utils/feedback-presenter';
import { summarizeRatings, toSummary } from '../utils/feedback-stats';
import { FeedbackEntity } from '../entities/feedback.entity';
import { FeedbackStoreService } from './feedback-store.service';

export interface CreateFeedbackRequest {
  rating: number;
  comment?: string | null;
  ticketNumber: string;
  role?: unknown;
}

export interface FeedbackListing {
  feedbacks: FeedbackPayload[];
  stats: FeedbackStats;
  canLeaveFeedback: boolean;
}

export type ResolveResponse = { feedback: FeedbackPayload } | { success: true; deleted: true };

function assertDisputable(feedback: FeedbackEntity): void {
  if (feedback.wasDisputed) {
    throw new FeedbackDisputeStateError('already-disputed', ALREADY_DISPUTED_MESSAGE);
  }

  if (feedback.disputed) {
    throw new FeedbackDisputeStateError(
      'dispute-open',
      'This feedback is already disputed and awaiting review.',
    );
  }
}

/**
 * Feedback Access Service
 * Applies the per-operation authorization rules for an explicit actor,
 * delegates state changes to the store and shapes the responses.
 */
@Injectable()
export class FeedbackAccessService {
  private readonly logger = new Logger(FeedbackAccessService.name);

  constructor(
    private readonly store: FeedbackStoreService,
    private readonly usersService: UsersService,
  ) {}

  async listForUser(
    username: string,
    viewer: Actor | null,
    filters: { role?: FeedbackRole } = {},
  ): Promise<FeedbackListing> {
    const user = await this.usersService.findByUsername(username);
    const feedbacks = await this.store.findForRecipient(user.id, filters);

    return {
      feedbacks: feedbacks.map((feedback) => presentFeedback(feedback, viewer)),
      stats: await this.stats(user.id),
      canLeaveFeedback: canLeaveFeedback(viewer, user),
    };
  }

  async view(feedbackId: string, viewer: Actor | null): Promise<FeedbackPayload> {
    const feedback = await this.store.findById(feedbackId);
    return presentFeedback(feedback, viewer);
  }

  async create(
    recipientUsername: string,
    actor: Actor,
    request: CreateFeedbackRequest,
  ): Promise<FeedbackPayload> {
    const recipient = await this.usersService.findByUsername(recipientUsername);

    if (recipient.id === actor.id) {
      throw new FeedbackAuthorizationError('Cannot leave feedback for yourself');
    }

    if (recipient.admin) {
      throw new FeedbackAuthorizationError('Cannot leave feedback for admin');
    }

    const feedback = await this.store.create({
      authorId: actor.id,
      recipientId: recipient.id,
      rating: request.rating,
      comment: request.comment,
      ticketNumber: request.ticketNumber,
      role: request.role,
    });

    return presentFeedback(feedback, actor);
  }

  async delete(feedbackId: string, actor: Actor): Promise<void> {
    const feedback = await this.store.findById(feedbackId);

    if (!canDeleteFeedback(actor, feedback)) {
      throw new FeedbackAuthorizationError('Not authorized');
    }

    await this.store.delete(feedback.id);
    this.logger.log(`Feedback ${feedback.id} removed by ${actor.username}`);
  }

  async dispute(feedbackId: string, actor: Actor, reason?: string | null): Promise<FeedbackPayload> {
    const feedback = await this.store.findById(feedbackId);

    if (feedback.recipientId !== actor.id) {
      throw new FeedbackAuthorizationError('Not authorized');
    }

    assertDisputable(feedback);

    // The record may have changed since it was read
    const result = await this.store.dispute(feedback.id, reason);
    if (!result.filed) {
      assertDisputable(result.feedback);
    }

    return presentFeedback(result.feedback, actor);
  }

  async resolve(feedbackId: string, actor: Actor, status: ResolutionStatus): Promise<ResolveResponse> {
    if (!actor.admin) {
      throw new FeedbackAuthorizationError('Admin access required');
    }

    const result = await this.store.resolve(feedbackId, actor.id, status);

    if (result.status === ResolutionStatus.Accepted) {
      return { success: true, deleted: true };
    }

    return { feedback: presentFeedback(result.feedback, actor) };
  }

  async openDisputes(actor: Actor): Promise<FeedbackPayload[]> {
    if (!actor.admin) {
      throw new FeedbackAuthorizationError('Admin access required');
    }

    const feedbacks = await this.store.findOpenDisputes();
    return feedbacks.map((feedback) => presentFeedback(feedback, actor));
  }

  async stats(userId: string): Promise<FeedbackStats> {
    return summarizeRatings(await this.store.findRatingsForRecipient(userId));
  }

  /**
   * Compact variant for user cards, without the pending-dispute count.
   */
  async summary(userId: string): Promise<FeedbackSummary> {
    return toSummary(await this.stats(userId));
  }
}
