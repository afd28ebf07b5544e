import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserEntity } from '../auth/entities/user.entity';
import { PrivateMessageEntity } from './entities/private-message.entity';
import { PrivateMessageService } from './services/private-message.service';
import { MessagesController } from './controllers/messages.controller';

@Module({
  imports: [TypeOrmModule.forFeature([PrivateMessageEntity, UserEntity])],
  controllers: [MessagesController],
  providers: [PrivateMessageService],
  exports: [PrivateMessageService],
})
export class MessagesModule {}
