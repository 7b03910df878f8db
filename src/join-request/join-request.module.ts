import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { Event } from '../event/model/event.model';
import { EventInvite } from '../invite/model/event-invite.model';
import { MembershipModule } from '../membership/membership.module';
import { EventMembership } from '../membership/model/event-membership.model';
import { EventJoinRequest } from './model/event-join-request.model';
import { JoinRequestService } from './join-request.service';

@Module({
  imports: [
    SequelizeModule.forFeature([EventJoinRequest, EventInvite, EventMembership, Event]),
    MembershipModule,
  ],
  providers: [JoinRequestService],
  exports: [JoinRequestService],
})
export class JoinRequestModule {}
