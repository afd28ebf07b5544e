import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsOptional } from 'class-validator';
import { FeedbackRole } from '../constants/feedback.constants';

export class ListFeedbackQueryDto {
  @ApiPropertyOptional({ enum: FeedbackRole, description: "Only feedback left in this role" })
  @IsOptional()
  @IsEnum(FeedbackRole)
  role?: FeedbackRole;
}
