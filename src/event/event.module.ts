import { Module } from '@nestjs/common';
import { SequelizeModule } from '@nestjs/sequelize';
import { InviteModule } from '../invite/invite.module';
import { MembershipModule } from '../membership/membership.module';
import { EventService } from './event.service';
import { Event } from './model/event.model';
import { EventStop } from './model/event-stop.model';

@Module({
  imports: [SequelizeModule.forFeature([Event, EventStop]), MembershipModule, InviteModule],
  providers: [EventService],
  exports: [EventService],
})
export class EventModule {}
