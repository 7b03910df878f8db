import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { Event } from '../event/model/event.model';
import { MembershipModule } from '../membership/membership.module';
import { DirectChat } from './model/direct-chat.model';
import { DirectChatLeave } from './model/direct-chat-leave.model';
import { DirectMessage } from './model/direct-message.model';
import { DirectChatService } from './direct-chat.service';

@Module({
  imports: [
    SequelizeModule.forFeature([DirectChat, DirectMessage, DirectChatLeave, Event]),
    MembershipModule,
  ],
  providers: [DirectChatService],
  exports: [DirectChatService],
})
export class DirectChatModule {}
