import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class DisputeFeedbackDto {
  @ApiPropertyOptional({ example: 'The item arrived as described' })
  @IsOptional()
  @IsString()
  reason?: string;
}
