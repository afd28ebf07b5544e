import { Controller, Get, UnauthorizedException, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserEntity } from '../../auth/entities/user.entity';
import { AdminGuard } from '../../auth/guards/admin.guard';
import { FeedbackAccessService } from '../services/feedback-access.service';

@ApiTags('Admin - Feedback')
@ApiBearerAuth()
@Controller('admin/feedback/disputes')
@UseGuards(AdminGuard)
export class FeedbackDisputesAdminController {
  constructor(private readonly feedbackAccessService: FeedbackAccessService) {}

  /**
   * GET /admin/feedback/disputes
   * Open disputes awaiting a verdict
   */
  @Get()
  @ApiOperation({ summary: 'List open feedback disputes' })
  async findOpen(@CurrentUser() user: UserEntity | null) {
    if (!user) {
      throw new UnauthorizedException();
    }

    return { feedbacks: await this.feedbackAccessService.openDisputes(user) };
  }
}
