import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from '../../auth/entities/user.entity';
import { PrivateMessageEntity } from '../entities/private-message.entity';

export class NotificationDeliveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotificationDeliveryError';
  }
}

export interface PrivateMessage {
  /** Username the message is sent on behalf of, usually the system actor */
  systemActor: string;
  title: string;
  body: string;
  recipientUsername: string;
}

/**
 * Private Message Service
 * Delivers forum private messages into the recipient's inbox
 */
@Injectable()
export class PrivateMessageService {
  private readonly logger = new Logger(PrivateMessageService.name);

  constructor(
    @InjectRepository(PrivateMessageEntity)
    private readonly messageRepository: Repository<PrivateMessageEntity>,
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
  ) {}

  /**
   * Raises NotificationDeliveryError when the recipient cannot receive messages.
   */
  async deliver(message: PrivateMessage): Promise<PrivateMessageEntity> {
    const recipient = await this.userRepository.findOne({
      where: { username: message.recipientUsername },
    });

    if (!recipient || !recipient.isActive) {
      throw new NotificationDeliveryError(
        `Recipient @${message.recipientUsername} cannot receive private messages`,
      );
    }

    // Plain insert: save() would open its own transaction on the shared connection
    const saved = this.messageRepository.create({
      senderUsername: message.systemActor,
      recipientId: recipient.id,
      title: message.title,
      body: message.body,
      readAt: null,
    });
    await this.messageRepository.insert(saved);

    this.logger.log(`Delivered "${message.title}" to @${recipient.username}`);

    return saved;
  }

  async listInbox(recipientId: string): Promise<PrivateMessageEntity[]> {
    return this.messageRepository.find({
      where: { recipientId },
      order: { createdAt: 'DESC' },
    });
  }
}
