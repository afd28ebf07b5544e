import { BeforeApplicationShutdown, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PrivateMessageService } from '../../messages/services/private-message.service';
import { ResolutionStatus } from '../constants/feedback.constants';
import {
  disputeResolvedMessage,
  feedbackReceivedMessage,
  FeedbackMessageContext,
  MessageContent,
} from '../utils/feedback-messages';

/**
 * Feedback Notifier
 * Sends the recipient-facing private messages. Delivery is never awaited by
 * the operation that triggered it and failures only reach the log.
 */
@Injectable()
export class FeedbackNotifierService implements BeforeApplicationShutdown {
  private readonly logger = new Logger(FeedbackNotifierService.name);
  private readonly pending = new Set<Promise<void>>();
  private readonly systemActor: string;

  constructor(
    private readonly privateMessageService: PrivateMessageService,
    configService: ConfigService,
  ) {
    this.systemActor = configService.get<string>('FEEDBACK_SYSTEM_USERNAME') ?? 'system';
  }

  feedbackReceived(context: FeedbackMessageContext): void {
    this.dispatch(
      feedbackReceivedMessage(context),
      context.recipientUsername,
      'Failed to notify feedback recipient',
    );
  }

  disputeResolved(context: FeedbackMessageContext, status: ResolutionStatus): void {
    this.dispatch(
      disputeResolvedMessage(context, status),
      context.recipientUsername,
      'Failed to notify dispute resolution',
    );
  }

  /**
   * Resolves once every in-flight delivery has settled.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  // Runs before TypeORM closes its connection
  async beforeApplicationShutdown(): Promise<void> {
    await this.drain();
  }

  private dispatch(content: MessageContent, recipientUsername: string, failure: string): void {
    const delivery = this.privateMessageService
      .deliver({
        systemActor: this.systemActor,
        title: content.title,
        body: content.body,
        recipientUsername,
      })
      .then(
        () => undefined,
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`${failure}: ${message}`);
        },
      );

    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }
}
