import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { UserEntity } from '../../auth/entities/user.entity';

@Entity('private_messages')
@Index('idx_private_messages_recipient_created', ['recipientId', 'createdAt'])
export class PrivateMessageEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('varchar', { length: 60 })
  senderUsername!: string;

  @Column('uuid')
  recipientId!: string;

  @Column('varchar', { length: 255 })
  title!: string;

  @Column('text')
  body!: string;

  @Column({ type: Date, nullable: true })
  readAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'recipient_id' })
  recipient?: UserEntity;
}
