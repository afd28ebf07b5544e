import { Controller, Get, Param } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/decorators/public.decorator';
import { UsersService } from '../../users/services/users.service';
import { FeedbackAccessService } from '../services/feedback-access.service';

@ApiTags('Users')
@Controller('users')
export class UserCardController {
  constructor(
    private readonly usersService: UsersService,
    private readonly feedbackAccessService: FeedbackAccessService,
  ) {}

  @Public()
  @Get(':username/card')
  @ApiOperation({ summary: 'Compact profile with feedback summary' })
  async card(@Param('username') username: string) {
    const user = await this.usersService.findByUsername(username);

    return {
      user: {
        id: user.id,
        username: user.username,
        avatarTemplate: user.avatarTemplate,
        admin: user.admin,
      },
      feedbackStats: await this.feedbackAccessService.summary(user.id),
    };
  }
}
