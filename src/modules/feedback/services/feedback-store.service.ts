import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, Not, Raw, Repository } from 'typeorm';
import { FeedbackEntity } from '../entities/feedback.entity';
import {
  FEEDBACK_COMMENT_MAX_LENGTH,
  FEEDBACK_RATING_MAX,
  FEEDBACK_RATING_MIN,
  FeedbackRole,
  normalizeFeedbackRole,
  ResolutionStatus,
} from '../constants/feedback.constants';
import {
  FeedbackDisputeStateError,
  FeedbackNotFoundError,
  FeedbackValidationError,
} from '../errors/feedback.errors';
import {
  CreateFeedbackInput,
  DisputeResult,
  ResolveResult,
} from '../interfaces/feedback.interface';
import { FeedbackMessageContext } from '../utils/feedback-messages';
import { RatingRow } from '../utils/feedback-stats';
import { isUniqueViolation } from '../../../db/unique-violation';
import { FeedbackNotifierService } from './feedback-notifier.service';

// Literal booleans compare the same way on PostgreSQL and SQLite
const isTrue = () => Raw<boolean>((column) => `${column} = TRUE`);
const isFalse = () => Raw<boolean>((column) => `${column} = FALSE`);

interface NormalizedFeedback {
  authorId: string;
  recipientId: string;
  rating: number;
  comment: string | null;
  ticketNumber: string;
  role: FeedbackRole;
}

/**
 * Feedback Store
 * Owns the feedback record invariants and performs the lifecycle
 * transitions: created -> disputed -> rejected (kept) | accepted (deleted).
 * Each transition is one conditional statement, so overlapping requests
 * cannot both apply. Authorization is the caller's concern.
 */
@Injectable()
export class FeedbackStoreService {
  private readonly logger = new Logger(FeedbackStoreService.name);

  constructor(
    @InjectRepository(FeedbackEntity)
    private readonly feedbackRepository: Repository<FeedbackEntity>,
    private readonly notifier: FeedbackNotifierService,
  ) {}

  /**
   * Uniqueness of (author, recipient, ticket) is left to the unique index;
   * its violation surfaces as the `duplicate` validation error.
   */
  async create(input: CreateFeedbackInput): Promise<FeedbackEntity> {
    const values = this.normalize(input);

    let id: unknown;
    try {
      const result = await this.feedbackRepository.insert(values);
      id = result.identifiers[0]?.id;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new FeedbackValidationError('duplicate', 'Already left feedback for this ticket');
      }
      throw error;
    }

    if (typeof id !== 'string') {
      throw new Error('Feedback insert did not return an identifier');
    }

    const feedback = await this.findById(id);

    this.logger.log(
      `Feedback ${feedback.id} created by ${feedback.authorId} for ${feedback.recipientId} (ticket ${feedback.ticketNumber})`,
    );

    const context = this.messageContext(feedback);
    if (context) {
      this.notifier.feedbackReceived(context);
    }

    return feedback;
  }

  /**
   * Opens a dispute. Only a record that is neither under dispute nor went
   * through one already is changed; otherwise it is reported with
   * `filed: false`.
   */
  async dispute(feedbackId: string, reason?: string | null): Promise<DisputeResult> {
    const { affected } = await this.feedbackRepository.update(
      { id: feedbackId, disputed: isFalse(), wasDisputed: isFalse() },
      {
        disputed: true,
        disputeReason: reason ? reason : null,
        disputedAt: new Date(),
      },
    );

    const feedback = await this.findById(feedbackId);

    if (!affected) {
      return { filed: false, feedback };
    }

    this.logger.log(`Dispute filed on feedback ${feedbackId}`);
    return { filed: true, feedback };
  }

  /**
   * Closes an open dispute. Accepting deletes the record; rejecting keeps it
   * and marks it as permanently undisputable. Records without an open
   * dispute are refused. Of two overlapping resolutions only one applies.
   */
  async resolve(
    feedbackId: string,
    adminId: string,
    status: ResolutionStatus,
  ): Promise<ResolveResult> {
    const feedback = await this.findById(feedbackId);

    if (!feedback.disputed) {
      throw new FeedbackDisputeStateError('not-disputed', 'Feedback is not under dispute');
    }

    // Captured before the record can disappear
    const context = this.messageContext(feedback);
    const openDispute = { id: feedbackId, disputed: isTrue() };

    let result: ResolveResult;
    if (status === ResolutionStatus.Accepted) {
      const { affected } = await this.feedbackRepository.delete(openDispute);
      if (!affected) {
        return this.lostResolution(feedbackId);
      }
      result = { status: ResolutionStatus.Accepted, deleted: true };
    } else {
      const { affected } = await this.feedbackRepository.update(openDispute, {
        disputed: false,
        resolvedById: adminId,
        resolvedAt: new Date(),
        resolutionStatus: ResolutionStatus.Rejected,
        wasDisputed: true,
      });
      if (!affected) {
        return this.lostResolution(feedbackId);
      }
      result = { status: ResolutionStatus.Rejected, feedback: await this.findById(feedbackId) };
    }

    this.logger.log(`Dispute on feedback ${feedbackId} ${status} by ${adminId}`);

    if (context) {
      this.notifier.disputeResolved(context, status);
    }

    return result;
  }

  async delete(feedbackId: string): Promise<void> {
    const { affected } = await this.feedbackRepository.delete({ id: feedbackId });

    if (!affected) {
      throw new FeedbackNotFoundError();
    }

    this.logger.log(`Feedback ${feedbackId} deleted`);
  }

  async findById(feedbackId: string): Promise<FeedbackEntity> {
    const feedback = await this.feedbackRepository.findOne({
      where: { id: feedbackId },
      relations: { author: true, recipient: true },
    });

    if (!feedback) {
      throw new FeedbackNotFoundError();
    }

    return feedback;
  }

  async findForRecipient(
    recipientId: string,
    filters: { role?: FeedbackRole } = {},
  ): Promise<FeedbackEntity[]> {
    return this.feedbackRepository.find({
      where: filters.role ? { recipientId, role: filters.role } : { recipientId },
      relations: { author: true },
      order: { createdAt: 'DESC' },
    });
  }

  /**
   * Records waiting for an administrator, oldest dispute first.
   */
  async findOpenDisputes(): Promise<FeedbackEntity[]> {
    const candidates = await this.feedbackRepository.find({
      where: { disputedAt: Not(IsNull()), resolutionStatus: IsNull() },
      relations: { author: true, recipient: true },
      order: { disputedAt: 'ASC' },
    });

    return candidates.filter((feedback) => feedback.disputed);
  }

  async findRatingsForRecipient(recipientId: string): Promise<RatingRow[]> {
    return this.feedbackRepository.find({
      select: { rating: true, disputed: true, resolutionStatus: true },
      where: { recipientId },
    });
  }

  private normalize(input: CreateFeedbackInput): NormalizedFeedback {
    if (input.authorId === input.recipientId) {
      throw new FeedbackValidationError('self-feedback', 'Cannot leave feedback for yourself');
    }

    if (
      !Number.isInteger(input.rating) ||
      input.rating < FEEDBACK_RATING_MIN ||
      input.rating > FEEDBACK_RATING_MAX
    ) {
      throw new FeedbackValidationError(
        'invalid-rating',
        `Rating must be an integer between ${FEEDBACK_RATING_MIN} and ${FEEDBACK_RATING_MAX}`,
      );
    }

    const ticketNumber = typeof input.ticketNumber === 'string' ? input.ticketNumber.trim() : '';
    if (ticketNumber === '') {
      throw new FeedbackValidationError('missing-ticket', 'Ticket number is required');
    }

    const comment = input.comment ? input.comment : null;
    if (comment !== null && comment.length > FEEDBACK_COMMENT_MAX_LENGTH) {
      throw new FeedbackValidationError(
        'comment-too-long',
        `Comment is too long (maximum is ${FEEDBACK_COMMENT_MAX_LENGTH} characters)`,
      );
    }

    return {
      authorId: input.authorId,
      recipientId: input.recipientId,
      rating: input.rating,
      comment,
      ticketNumber,
      role: normalizeFeedbackRole(input.role),
    };
  }

  /**
   * The conditional write matched nothing: the record was removed or its
   * dispute closed after it was read.
   */
  private async lostResolution(feedbackId: string): Promise<never> {
    const exists = await this.feedbackRepository.exists({ where: { id: feedbackId } });

    if (!exists) {
      throw new FeedbackNotFoundError();
    }
    throw new FeedbackDisputeStateError('not-disputed', 'Feedback is not under dispute');
  }

  private messageContext(feedback: FeedbackEntity): FeedbackMessageContext | null {
    if (!feedback.author || !feedback.recipient) {
      this.logger.warn(`Feedback ${feedback.id} is missing its author or recipient, skipping notification`);
      return null;
    }

    return {
      authorUsername: feedback.author.username,
      recipientUsername: feedback.recipient.username,
      rating: feedback.rating,
      role: feedback.role,
      ticketNumber: feedback.ticketNumber,
      comment: feedback.comment,
    };
  }
}
