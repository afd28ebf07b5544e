import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

@Entity('users')
@Index('idx_users_username', ['username'], { unique: true })
@Index('idx_users_email', ['email'], { unique: true })
export class UserEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('varchar', { length: 60 })
  username!: string;

  @Column('varchar', { length: 255 })
  email!: string;

  @Column('varchar', { length: 255, select: false })
  password?: string;

  @Column('varchar', { length: 255, nullable: true })
  avatarTemplate!: string | null;

  @Column('boolean', { default: false })
  admin!: boolean;

  @Column('boolean', { default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
