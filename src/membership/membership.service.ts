import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { runInTransaction } from '../common/utils/transaction.util';
import { isUniqueConstraintError } from '../common/utils/unique-constraint.util';
import { Event, EventAttributes } from '../event/model/event.model';
import { EventInvite, InviteStatus } from '../invite/model/event-invite.model';
import { ViewerRelationship, canJoin } from '../visibility/visibility.policy';
import { EventMembership, MembershipRole } from './model/event-membership.model';

export type EventRole = 'HOST' | 'ATTENDEE' | 'VISITOR';

const JOINED_ROLES = [MembershipRole.HOST, MembershipRole.ATTENDEE];

@Injectable()
export class MembershipService {
  private readonly logger = new Logger(MembershipService.name);

  constructor(
    @InjectModel(EventMembership)
    private readonly membershipModel: typeof EventMembership,
    @InjectModel(EventInvite)
    private readonly inviteModel: typeof EventInvite,
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    private readonly sequelize: Sequelize,
  ) {}

  /** Insert-or-update of the (event, user) row. */
  async grant(
    eventId: number,
    userId: number,
    role: MembershipRole,
    transaction?: Transaction,
  ): Promise<EventMembership> {
    const existing = await this.membershipModel.findOne({
      where: { eventId, userId },
      transaction,
    });
    if (existing) {
      if (existing.role !== role) {
        await existing.update({ role }, { transaction });
      }
      return existing;
    }
    return this.membershipModel.create({ eventId, userId, role }, { transaction });
  }

  async hasRole(
    eventId: number,
    userId: number,
    roles: MembershipRole[],
    transaction?: Transaction,
  ): Promise<boolean> {
    const count = await this.membershipModel.count({
      where: { eventId, userId, role: { [Op.in]: roles } },
      transaction,
    });
    return count > 0;
  }

  userHasJoined(eventId: number, userId: number, transaction?: Transaction): Promise<boolean> {
    return this.hasRole(eventId, userId, JOINED_ROLES, transaction);
  }

  /** Deletes the row only while it still holds `expectedRole`. */
  async revoke(
    eventId: number,
    userId: number,
    expectedRole: MembershipRole,
    transaction?: Transaction,
  ): Promise<Result<void>> {
    const removed = await this.membershipModel.destroy({
      where: { eventId, userId, role: expectedRole },
      transaction,
    });
    if (removed === 0) {
      return fail('NotAMember', `User ${userId} holds no ${expectedRole} membership on this event.`);
    }
    return ok(undefined);
  }

  async getRelationship(
    event: Pick<EventAttributes, 'id'>,
    userId: number,
    transaction?: Transaction,
  ): Promise<ViewerRelationship> {
    const [membership, invite] = await Promise.all([
      this.membershipModel.findOne({ where: { eventId: event.id, userId }, transaction }),
      this.inviteModel.findOne({ where: { eventId: event.id, inviteeId: userId }, transaction }),
    ]);
    return {
      userId,
      role: membership ? membership.role : null,
      hasInvite: invite !== null,
      hasPendingInvite: invite !== null && invite.status === InviteStatus.PENDING,
    };
  }

  async join(eventId: number, userId: number): Promise<Result<EventMembership>> {
    try {
      return await runInTransaction(this.sequelize, async (transaction) => {
        const event = await this.eventModel.findByPk(eventId, { transaction });
        if (!event) {
          return fail('NotFound', 'Event not found.');
        }

        const relationship = await this.getRelationship(event, userId, transaction);
        const allowed = canJoin(event, relationship);
        if (!allowed.ok) {
          return allowed;
        }

        const membership = await this.grant(eventId, userId, MembershipRole.ATTENDEE, transaction);
        this.logger.log(`User ${userId} joined event ${eventId}`);
        return ok(membership);
      });
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      return this.resolveJoinRace(eventId, userId);
    }
  }

  async leave(eventId: number, userId: number): Promise<Result<void>> {
    return runInTransaction(this.sequelize, async (transaction) => {
      const event = await this.eventModel.findByPk(eventId, { transaction });
      if (!event || event.isDeleted) {
        return fail('NotFound', 'Event not found.');
      }
      if (event.hostId === userId) {
        return fail('HostCannotLeave', 'The host cannot leave their own event.');
      }

      const revoked = await this.revoke(eventId, userId, MembershipRole.ATTENDEE, transaction);
      if (!revoked.ok) {
        return fail('NotRegistered', 'You are not registered for this event.');
      }
      this.logger.log(`User ${userId} left event ${eventId}`);
      return ok(undefined);
    });
  }

  async userRoleInEvent(
    event: Pick<EventAttributes, 'id' | 'hostId'>,
    userId: number,
  ): Promise<EventRole> {
    if (event.hostId === userId) {
      return 'HOST';
    }
    const attending = await this.hasRole(event.id, userId, [MembershipRole.ATTENDEE]);
    return attending ? 'ATTENDEE' : 'VISITOR';
  }

  /** HOST and ATTENDEE rows, earliest joined first. */
  async listAttendees(eventId: number): Promise<Result<EventMembership[]>> {
    const event = await this.eventModel.findByPk(eventId);
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }

    const attendees = await this.membershipModel.findAll({
      where: { eventId, role: { [Op.in]: JOINED_ROLES } },
      order: [
        ['createdAt', 'ASC'],
        ['id', 'ASC'],
      ],
    });
    return ok(attendees);
  }

  // A concurrent insert won the (event, user) key; the failed transaction is
  // already rolled back, so settle against whatever row is there now.
  private async resolveJoinRace(
    eventId: number,
    userId: number,
  ): Promise<Result<EventMembership>> {
    const current = await this.membershipModel.findOne({ where: { eventId, userId } });
    if (current && current.role === MembershipRole.INVITED) {
      await current.update({ role: MembershipRole.ATTENDEE });
      this.logger.warn(`Join race on event ${eventId}: promoted invited user ${userId}`);
      return ok(current);
    }
    this.logger.warn(`Join race on event ${eventId}: user ${userId} already joined`);
    return fail('AlreadyJoined', 'You have already joined this event.');
  }
}
