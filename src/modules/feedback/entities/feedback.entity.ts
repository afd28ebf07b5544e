import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { UserEntity } from '../../auth/entities/user.entity';
import { FeedbackRole, ResolutionStatus } from '../constants/feedback.constants';

@Entity('feedbacks')
@Index('idx_feedbacks_author', ['authorId'])
@Index('idx_feedbacks_recipient', ['recipientId'])
@Index('idx_feedbacks_ticket', ['ticketNumber'])
@Index('idx_feedback_unique', ['authorId', 'recipientId', 'ticketNumber'], { unique: true })
export class FeedbackEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  authorId!: string;

  @Column('uuid')
  recipientId!: string;

  @Column('int')
  rating!: number;

  @Column('text', { nullable: true })
  comment!: string | null;

  @Column('varchar', { length: 255 })
  ticketNumber!: string;

  @Column('varchar', { length: 20, default: FeedbackRole.Buyer })
  role!: FeedbackRole;

  // True only while a dispute is open
  @Column('boolean', { default: false })
  disputed!: boolean;

  @Column('text', { nullable: true })
  disputeReason!: string | null;

  @Column({ type: Date, nullable: true })
  disputedAt!: Date | null;

  @Column('uuid', { nullable: true })
  resolvedById!: string | null;

  @Column({ type: Date, nullable: true })
  resolvedAt!: Date | null;

  @Column('varchar', { length: 20, nullable: true })
  resolutionStatus!: ResolutionStatus | null;

  // Sticky: set when a dispute is rejected, blocks any further dispute
  @Column('boolean', { default: false })
  wasDisputed!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'author_id' })
  author?: UserEntity;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'recipient_id' })
  recipient?: UserEntity;
}
