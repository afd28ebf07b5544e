import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseEnumPipe,
  ParseUUIDPipe,
  Post,
  Query,
  UnauthorizedException,
  UnprocessableEntityException,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/decorators/public.decorator';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserEntity } from '../../auth/entities/user.entity';
import { AdminGuard } from '../../auth/guards/admin.guard';
import { FEEDBACK_ROUTE_PREFIX, ResolutionStatus } from '../constants/feedback.constants';
import { CreateFeedbackDto, DisputeFeedbackDto, ListFeedbackQueryDto } from '../dto';
import { Actor } from '../interfaces/feedback.interface';
import { FeedbackAccessService } from '../services/feedback-access.service';

function requireActor(user: UserEntity | null): Actor {
  if (!user) {
    throw new UnauthorizedException();
  }
  return user;
}

@ApiTags('Feedback')
@Controller(FEEDBACK_ROUTE_PREFIX)
export class FeedbackController {
  constructor(private readonly feedbackAccessService: FeedbackAccessService) {}

  /**
   * GET /deald-feedback/user/:username
   */
  @Public()
  @Get('user/:username')
  @ApiOperation({ summary: 'List feedback received by a user, with rating statistics' })
  @ApiResponse({ status: 404, description: 'Unknown username' })
  async listForUser(
    @Param('username') username: string,
    @Query() query: ListFeedbackQueryDto,
    @CurrentUser() viewer: UserEntity | null,
  ) {
    return this.feedbackAccessService.listForUser(username, viewer, { role: query.role });
  }

  @Public()
  @Get(':id')
  @ApiOperation({ summary: 'Fetch a single feedback' })
  async findOne(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() viewer: UserEntity | null,
  ) {
    return { feedback: await this.feedbackAccessService.view(id, viewer) };
  }

  @Post('user/:username')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Leave feedback for a user on a ticket' })
  @ApiResponse({ status: 403, description: 'Self-feedback or administrator recipient' })
  @ApiResponse({ status: 422, description: 'Invalid rating, ticket, comment or duplicate' })
  async create(
    @Param('username') username: string,
    @Body() createFeedbackDto: CreateFeedbackDto,
    @CurrentUser() user: UserEntity | null,
  ) {
    const feedback = await this.feedbackAccessService.create(username, requireActor(user), {
      rating: createFeedbackDto.rating,
      comment: createFeedbackDto.comment,
      ticketNumber: createFeedbackDto.ticketNumber,
      role: createFeedbackDto.role,
    });

    return { feedback };
  }

  @Delete(':id')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete feedback (author or administrator)' })
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: UserEntity | null,
  ) {
    await this.feedbackAccessService.delete(id, requireActor(user));
    return { success: true };
  }

  @Post(':id/dispute')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Dispute feedback you received' })
  @ApiResponse({ status: 422, description: 'Feedback already disputed' })
  async dispute(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() disputeFeedbackDto: DisputeFeedbackDto,
    @CurrentUser() user: UserEntity | null,
  ) {
    const feedback = await this.feedbackAccessService.dispute(
      id,
      requireActor(user),
      disputeFeedbackDto.reason,
    );

    return { feedback };
  }

  @Post(':id/resolve')
  @HttpCode(HttpStatus.OK)
  @UseGuards(AdminGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Resolve an open dispute (administrators)' })
  @ApiResponse({ status: 422, description: 'Invalid status or feedback not under dispute' })
  async resolve(
    @Param('id', ParseUUIDPipe) id: string,
    @Body(
      'status',
      new ParseEnumPipe(ResolutionStatus, {
        exceptionFactory: () =>
          new UnprocessableEntityException({ statusCode: 422, error: 'Invalid status' }),
      }),
    )
    status: ResolutionStatus,
    @CurrentUser() user: UserEntity | null,
  ) {
    return this.feedbackAccessService.resolve(id, requireActor(user), status);
  }
}
