import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { Event } from '../event/model/event.model';
import { MembershipModule } from '../membership/membership.module';
import { EventChatMessage } from './model/event-chat-message.model';
import { MessageReport } from './model/message-report.model';
import { ChatService } from './chat.service';

@Module({
  imports: [SequelizeModule.forFeature([EventChatMessage, MessageReport, Event]), MembershipModule],
  providers: [ChatService],
  exports: [ChatService],
})
export class ChatModule {}
