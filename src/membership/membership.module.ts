import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { Event } from '../event/model/event.model';
import { EventInvite } from '../invite/model/event-invite.model';
import { EventMembership } from './model/event-membership.model';
import { MembershipService } from './membership.service';

@Module({
  imports: [SequelizeModule.forFeature([EventMembership, EventInvite, Event])],
  providers: [MembershipService],
  exports: [MembershipService],
})
export class MembershipModule {}
