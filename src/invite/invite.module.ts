import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { Event } from '../event/model/event.model';
import { MembershipModule } from '../membership/membership.module';
import { EventMembership } from '../membership/model/event-membership.model';
import { EventInvite } from './model/event-invite.model';
import { InviteService } from './invite.service';

@Module({
  imports: [SequelizeModule.forFeature([EventInvite, EventMembership, Event]), MembershipModule],
  providers: [InviteService],
  exports: [InviteService],
})
export class InviteModule {}
