import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { dedupeIds } from '../common/utils/id-list.util';
import { runInTransaction } from '../common/utils/transaction.util';
import { isUniqueConstraintError } from '../common/utils/unique-constraint.util';
import { USER_DIRECTORY, UserDirectory } from '../directory/directory.interfaces';
import { Event } from '../event/model/event.model';
import { MembershipService } from '../membership/membership.service';
import { EventMembership, MembershipRole } from '../membership/model/event-membership.model';
import { EventInvite, InviteStatus } from './model/event-invite.model';

export interface PendingInvitation {
  invite: EventInvite;
  event: Event;
}

@Injectable()
export class InviteService {
  private readonly logger = new Logger(InviteService.name);

  constructor(
    @InjectModel(EventInvite)
    private readonly inviteModel: typeof EventInvite,
    @InjectModel(EventMembership)
    private readonly membershipModel: typeof EventMembership,
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectory,
    private readonly membershipService: MembershipService,
    private readonly sequelize: Sequelize,
  ) {}

  /**
   * Invites every listed user who has neither an invite nor a membership on
   * the event yet, each with a PENDING invite and an INVITED membership.
   * Existing invites are left untouched, so calling again with an overlapping
   * list only adds the new ids. Returns just the invites created by this call.
   */
  async createInvites(
    eventId: number,
    hostId: number,
    inviteeIds: number[],
    transaction?: Transaction,
  ): Promise<Result<EventInvite[]>> {
    try {
      return await runInTransaction(
        this.sequelize,
        async (t) => {
          const event = await this.eventModel.findByPk(eventId, {
            transaction: t,
            lock: Transaction.LOCK.UPDATE,
          });
          if (!event || event.isDeleted) {
            return fail('NotFound', 'Event not found.');
          }
          if (event.hostId !== hostId) {
            return fail('Forbidden', 'Only the host can invite users to this event.');
          }
          return this.issueInvites(event, inviteeIds, t);
        },
        transaction,
      );
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      this.logger.warn(`Invite race on event ${eventId}: ${error.message}`);
      return fail('AlreadyInvited', 'One or more users have already been invited.');
    }
  }

  async accept(inviteId: number, actorId: number): Promise<Result<EventInvite>> {
    try {
      return await this.acceptOnce(inviteId, actorId);
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      // a concurrent join inserted the membership row first; the retry updates it
      this.logger.warn(`Membership race while accepting invite ${inviteId}, retrying`);
      return this.acceptOnce(inviteId, actorId);
    }
  }

  async decline(inviteId: number, actorId: number): Promise<Result<EventInvite>> {
    return runInTransaction(this.sequelize, async (transaction) => {
      const loaded = await this.loadForResponse(inviteId, actorId, transaction);
      if (!loaded.ok) {
        return loaded;
      }

      const invite = loaded.value;
      await invite.update(
        { status: InviteStatus.DECLINED, respondedAt: invite.respondedAt ?? new Date() },
        { transaction },
      );
      // only the provisional row goes; an ATTENDEE who declines later stays in
      await this.membershipService.revoke(
        invite.eventId,
        invite.inviteeId,
        MembershipRole.INVITED,
        transaction,
      );
      this.logger.log(`Invite ${invite.id} declined by user ${actorId}`);
      return ok(invite);
    });
  }

  /** PENDING invites on live events, oldest first. */
  async listUserInvitations(userId: number): Promise<PendingInvitation[]> {
    const invites = await this.inviteModel.findAll({
      where: { inviteeId: userId, status: InviteStatus.PENDING },
      order: [
        ['createdAt', 'ASC'],
        ['id', 'ASC'],
      ],
    });
    if (invites.length === 0) {
      return [];
    }

    const events = await this.eventModel.findAll({
      where: { id: { [Op.in]: dedupeIds(invites.map((invite) => invite.eventId)) }, isDeleted: false },
    });
    const eventsById = new Map(events.map((event): [number, Event] => [event.id, event]));

    return invites.flatMap((invite) => {
      const event = eventsById.get(invite.eventId);
      return event ? [{ invite, event }] : [];
    });
  }

  private async issueInvites(
    event: Event,
    inviteeIds: number[],
    transaction: Transaction,
  ): Promise<Result<EventInvite[]>> {
    const candidates = dedupeIds(inviteeIds, [event.hostId]);
    if (candidates.length === 0) {
      return ok([]);
    }

    const known = await this.userDirectory.existing(candidates);
    if (candidates.some((id) => !known.has(id))) {
      return fail('ValidationError', 'One or more invitees are invalid.');
    }

    const [invited, members] = await Promise.all([
      this.inviteModel.findAll({
        where: { eventId: event.id, inviteeId: { [Op.in]: candidates } },
        transaction,
      }),
      this.membershipModel.findAll({
        where: { eventId: event.id, userId: { [Op.in]: candidates } },
        transaction,
      }),
    ]);
    const taken = new Set<number>([
      ...invited.map((invite) => invite.inviteeId),
      ...members.map((membership) => membership.userId),
    ]);

    const created: EventInvite[] = [];
    for (const inviteeId of candidates.filter((id) => !taken.has(id))) {
      const invite = await this.inviteModel.create(
        {
          eventId: event.id,
          inviteeId,
          invitedById: event.hostId,
          status: InviteStatus.PENDING,
        },
        { transaction },
      );
      await this.membershipService.grant(event.id, inviteeId, MembershipRole.INVITED, transaction);
      created.push(invite);
    }

    if (created.length > 0) {
      this.logger.log(`Issued ${created.length} invite(s) for event ${event.id}`);
    }
    return ok(created);
  }

  private async acceptOnce(inviteId: number, actorId: number): Promise<Result<EventInvite>> {
    return runInTransaction(this.sequelize, async (transaction) => {
      const loaded = await this.loadForResponse(inviteId, actorId, transaction);
      if (!loaded.ok) {
        return loaded;
      }

      const invite = loaded.value;
      await invite.update(
        { status: InviteStatus.ACCEPTED, respondedAt: invite.respondedAt ?? new Date() },
        { transaction },
      );
      await this.membershipService.grant(
        invite.eventId,
        invite.inviteeId,
        MembershipRole.ATTENDEE,
        transaction,
      );
      this.logger.log(`Invite ${invite.id} accepted by user ${actorId}`);
      return ok(invite);
    });
  }

  private async loadForResponse(
    inviteId: number,
    actorId: number,
    transaction: Transaction,
  ): Promise<Result<EventInvite>> {
    const invite = await this.inviteModel.findByPk(inviteId, { transaction });
    if (!invite) {
      return fail('NotFound', 'Invite not found.');
    }
    if (invite.inviteeId !== actorId) {
      return fail('Forbidden', 'Only the invitee can respond to this invite.');
    }
    if (invite.status === InviteStatus.EXPIRED) {
      return fail('ValidationError', 'This invite has expired.');
    }

    const event = await this.eventModel.findByPk(invite.eventId, { transaction });
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }
    return ok(invite);
  }
}
