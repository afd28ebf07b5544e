import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { MessagesModule } from '../messages/messages.module';
import { UsersModule } from '../users/users.module';
import { FeedbackEntity } from './entities/feedback.entity';
import { FeedbackStoreService } from './services/feedback-store.service';
import { FeedbackAccessService } from './services/feedback-access.service';
import { FeedbackNotifierService } from './services/feedback-notifier.service';
import { FeedbackController } from './controllers/feedback.controller';
import { FeedbackDisputesAdminController } from './controllers/feedback-disputes.admin.controller';
import { UserCardController } from './controllers/user-card.controller';
import { FeedbackExceptionFilter } from './filters/feedback-exception.filter';
import { FeedbackEnabledMiddleware } from './middleware/feedback-enabled.middleware';

@Module({
  imports: [
    AuthModule,
    UsersModule,
    MessagesModule,
    TypeOrmModule.forFeature([FeedbackEntity]),
  ],
  controllers: [FeedbackController, FeedbackDisputesAdminController, UserCardController],
  providers: [
    FeedbackStoreService,
    FeedbackAccessService,
    FeedbackNotifierService,
    { provide: APP_FILTER, useClass: FeedbackExceptionFilter },
  ],
  exports: [FeedbackStoreService, FeedbackAccessService],
})
export class FeedbackModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(FeedbackEnabledMiddleware)
      .forRoutes(FeedbackController, FeedbackDisputesAdminController, UserCardController);
  }
}
