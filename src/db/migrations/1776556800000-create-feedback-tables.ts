import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateFeedbackTables1776556800000 implements MigrationInterface {
  name = 'CreateFeedbackTables1776556800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS users (
        id uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        username varchar(60) NOT NULL,
        email varchar(255) NOT NULL,
        password varchar(255) NOT NULL,
        avatar_template varchar(255) NULL,
        admin boolean NOT NULL DEFAULT false,
        is_active boolean NOT NULL DEFAULT true,
        created_at TIMESTAMP NOT NULL DEFAULT now(),
        updated_at TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX IF NOT EXISTS idx_users_username ON users (username)`);
    await queryRunner.query(`CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users (email)`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS feedbacks (
        id uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        author_id uuid NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        recipient_id uuid NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        rating integer NOT NULL CHECK (rating BETWEEN 1 AND 5),
        comment text NULL,
        ticket_number varchar(255) NOT NULL,
        role varchar(20) NOT NULL DEFAULT 'buyer',
        disputed boolean NOT NULL DEFAULT false,
        dispute_reason text NULL,
        disputed_at TIMESTAMP NULL,
        resolved_by_id uuid NULL,
        resolved_at TIMESTAMP NULL,
        resolution_status varchar(20) NULL,
        was_disputed boolean NOT NULL DEFAULT false,
        created_at TIMESTAMP NOT NULL DEFAULT now(),
        updated_at TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT chk_feedbacks_not_self CHECK (author_id <> recipient_id)
      )
    `);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_feedbacks_author ON feedbacks (author_id)`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_feedbacks_recipient ON feedbacks (recipient_id)`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_feedbacks_ticket ON feedbacks (ticket_number)`);
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_feedback_unique
      ON feedbacks (author_id, recipient_id, ticket_number)
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS private_messages (
        id uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        sender_username varchar(60) NOT NULL,
        recipient_id uuid NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        title varchar(255) NOT NULL,
        body text NOT NULL,
        read_at TIMESTAMP NULL,
        created_at TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_private_messages_recipient_created
      ON private_messages (recipient_id, created_at)
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS private_messages`);
    await queryRunner.query(`DROP TABLE IF EXISTS feedbacks`);
    await queryRunner.query(`DROP TABLE IF EXISTS users`);
  }
}
