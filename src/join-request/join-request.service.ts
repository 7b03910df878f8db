import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { runInTransaction } from '../common/utils/transaction.util';
import { isUniqueConstraintError } from '../common/utils/unique-constraint.util';
import { Event, EventVisibility } from '../event/model/event.model';
import { EventInvite, InviteStatus } from '../invite/model/event-invite.model';
import { MembershipService } from '../membership/membership.service';
import { EventMembership, MembershipRole } from '../membership/model/event-membership.model';
import { EventJoinRequest, JoinRequestStatus } from './model/event-join-request.model';

@Injectable()
export class JoinRequestService {
  private readonly logger = new Logger(JoinRequestService.name);

  constructor(
    @InjectModel(EventJoinRequest)
    private readonly joinRequestModel: typeof EventJoinRequest,
    @InjectModel(EventInvite)
    private readonly inviteModel: typeof EventInvite,
    @InjectModel(EventMembership)
    private readonly membershipModel: typeof EventMembership,
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    private readonly membershipService: MembershipService,
    private readonly sequelize: Sequelize,
  ) {}

  /**
   * Asks to join a PUBLIC_INVITE event. An existing request is returned as is.
   * Attendees are told they are members even while an old invite is still
   * pending; an INVITED row alone means the invite is what to answer.
   */
  async requestJoin(eventId: number, userId: number): Promise<Result<EventJoinRequest>> {
    try {
      return await runInTransaction(this.sequelize, async (transaction) => {
        const event = await this.eventModel.findByPk(eventId, {
          transaction,
          lock: Transaction.LOCK.UPDATE,
        });
        if (!event || event.isDeleted) {
          return fail('NotFound', 'Event not found.');
        }
        if (event.visibility !== EventVisibility.PUBLIC_INVITE) {
          return fail('ValidationError', 'Join requests are only accepted for invite-only public events.');
        }

        if (await this.membershipService.userHasJoined(eventId, userId, transaction)) {
          return fail('AlreadyMember', 'You are already a member of this event.');
        }

        const pendingInvite = await this.inviteModel.findOne({
          where: { eventId, inviteeId: userId, status: InviteStatus.PENDING },
          transaction,
        });
        if (pendingInvite) {
          return fail('AlreadyInvited', 'You already have a pending invite to this event.');
        }

        const membership = await this.membershipModel.findOne({ where: { eventId, userId }, transaction });
        if (membership) {
          return fail('AlreadyMember', 'You are already a member of this event.');
        }

        const [request, created] = await this.joinRequestModel.findOrCreate({
          where: { eventId, requesterId: userId },
          defaults: { eventId, requesterId: userId, status: JoinRequestStatus.PENDING },
          transaction,
        });
        if (created) {
          this.logger.log(`User ${userId} requested to join event ${eventId}`);
        }
        return ok(request);
      });
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      const existing = await this.joinRequestModel.findOne({
        where: { eventId, requesterId: userId },
      });
      if (!existing) {
        throw error;
      }
      this.logger.warn(`Join request race on event ${eventId} for user ${userId}`);
      return ok(existing);
    }
  }

  /** Host only. Approving also makes the requester an ATTENDEE. */
  async approve(requestId: number, actorId: number): Promise<Result<EventJoinRequest>> {
    try {
      return await this.decideOnce(requestId, actorId, JoinRequestStatus.APPROVED);
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      this.logger.warn(`Membership race while approving join request ${requestId}, retrying`);
      return this.decideOnce(requestId, actorId, JoinRequestStatus.APPROVED);
    }
  }

  decline(requestId: number, actorId: number): Promise<Result<EventJoinRequest>> {
    return this.decideOnce(requestId, actorId, JoinRequestStatus.DECLINED);
  }

  async getPendingRequest(eventId: number, userId: number): Promise<EventJoinRequest | null> {
    return this.joinRequestModel.findOne({
      where: { eventId, requesterId: userId, status: JoinRequestStatus.PENDING },
    });
  }

  async listPendingRequests(eventId: number, actorId: number): Promise<Result<EventJoinRequest[]>> {
    const event = await this.eventModel.findByPk(eventId);
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }
    if (event.hostId !== actorId) {
      return fail('Forbidden', 'Only the host can review join requests.');
    }

    const requests = await this.joinRequestModel.findAll({
      where: { eventId, status: JoinRequestStatus.PENDING },
      order: [
        ['createdAt', 'ASC'],
        ['id', 'ASC'],
      ],
    });
    return ok(requests);
  }

  private decideOnce(
    requestId: number,
    actorId: number,
    decision: JoinRequestStatus.APPROVED | JoinRequestStatus.DECLINED,
  ): Promise<Result<EventJoinRequest>> {
    return runInTransaction(this.sequelize, async (transaction) => {
      const request = await this.joinRequestModel.findByPk(requestId, { transaction });
      if (!request) {
        return fail('NotFound', 'Join request not found.');
      }

      const event = await this.eventModel.findByPk(request.eventId, { transaction });
      if (!event || event.isDeleted) {
        return fail('NotFound', 'Event not found.');
      }
      if (event.hostId !== actorId) {
        return fail('Forbidden', 'Only the host can review join requests.');
      }
      if (request.status !== JoinRequestStatus.PENDING) {
        return fail('ValidationError', 'This join request has already been decided.');
      }

      await request.update({ status: decision, decidedAt: new Date() }, { transaction });
      if (decision === JoinRequestStatus.APPROVED) {
        await this.membershipService.grant(
          request.eventId,
          request.requesterId,
          MembershipRole.ATTENDEE,
          transaction,
        );
      }
      this.logger.log(`Join request ${request.id} ${decision.toLowerCase()} by host ${actorId}`);
      return ok(request);
    });
  }
}
