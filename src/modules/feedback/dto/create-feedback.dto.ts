import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString } from 'class-validator';
import { FeedbackRole, normalizeFeedbackRole } from '../constants/feedback.constants';

/**
 * Range, length and ticket checks are left to the store so that every
 * entry point reports them the same way.
 */
export class CreateFeedbackDto {
  @ApiProperty({ minimum: 1, maximum: 5, example: 5 })
  @IsInt()
  rating!: number;

  @ApiPropertyOptional({ maxLength: 1000 })
  @IsOptional()
  @IsString()
  comment?: string;

  @ApiProperty({ example: 'T-1042' })
  @IsString()
  ticketNumber!: string;

  @ApiPropertyOptional({ enum: FeedbackRole, default: FeedbackRole.Buyer })
  @IsOptional()
  @Transform(({ value }) => normalizeFeedbackRole(value))
  @IsEnum(FeedbackRole)
  role?: FeedbackRole;
}
