import { Controller, Get, UnauthorizedException } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserEntity } from '../../auth/entities/user.entity';
import { PrivateMessageService } from '../services/private-message.service';

@ApiTags('Messages')
@ApiBearerAuth()
@Controller('messages')
export class MessagesController {
  constructor(private readonly privateMessageService: PrivateMessageService) {}

  /**
   * GET /messages
   * Inbox of the authenticated user, newest first
   */
  @Get()
  @ApiOperation({ summary: 'List private messages received by the current user' })
  async inbox(@CurrentUser() user: UserEntity | null) {
    if (!user) {
      throw new UnauthorizedException();
    }

    const messages = await this.privateMessageService.listInbox(user.id);
    return { messages };
  }
}
