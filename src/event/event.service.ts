import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { dedupeIds } from '../common/utils/id-list.util';
import { generateEventSlug } from '../common/utils/slug.util';
import { runInTransaction } from '../common/utils/transaction.util';
import { validateDto } from '../common/utils/validate-dto.util';
import { LOCATION_DIRECTORY, LocationDirectory } from '../directory/directory.interfaces';
import { InviteService } from '../invite/invite.service';
import { EventInvite } from '../invite/model/event-invite.model';
import { MembershipService } from '../membership/membership.service';
import { MembershipRole } from '../membership/model/event-membership.model';
import { canView } from '../visibility/visibility.policy';
import {
  CreateEventDto,
  CreateEventInput,
  UpdateEventDto,
  UpdateEventInput,
} from './dto/event.dto';
import { Event, EventAttributes, EventVisibility } from './model/event.model';
import { EventStop } from './model/event-stop.model';

export interface EventWithStops {
  event: Event;
  stops: EventStop[];
}

export interface SavedEvent extends EventWithStops {
  /** Invites created by this call only. */
  invites: EventInvite[];
}

export interface PublicEventFilters {
  query?: string;
  visibility?: 'open' | 'invite';
  order?: 'start_time' | '-start_time';
}

type EditableFields = Partial<
  Pick<EventAttributes, 'title' | 'description' | 'visibility' | 'startTime' | 'startLocationId'>
>;

@Injectable()
export class EventService {
  private readonly logger = new Logger(EventService.name);

  constructor(
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    @InjectModel(EventStop)
    private readonly stopModel: typeof EventStop,
    @Inject(LOCATION_DIRECTORY)
    private readonly locationDirectory: LocationDirectory,
    private readonly membershipService: MembershipService,
    private readonly inviteService: InviteService,
    private readonly sequelize: Sequelize,
  ) {}

  /**
   * Creates the event together with the host's membership, its ordered stops
   * and the initial invites, all in one transaction.
   */
  async createEvent(hostId: number, input: CreateEventInput): Promise<Result<SavedEvent>> {
    const validated = await validateDto(CreateEventDto, input);
    if (!validated.ok) {
      return validated;
    }
    const dto = validated.value;

    const stopIds = dedupeIds(dto.stopLocationIds ?? []);
    const locations = await this.verifyLocations([dto.startLocationId, ...stopIds]);
    if (!locations.ok) {
      return locations;
    }

    return runInTransaction(this.sequelize, async (transaction) => {
      const event = await this.eventModel.create(
        {
          slug: generateEventSlug(dto.title),
          title: dto.title,
          description: dto.description ?? null,
          hostId,
          visibility: dto.visibility ?? EventVisibility.PUBLIC_OPEN,
          startTime: dto.startTime,
          startLocationId: dto.startLocationId,
        },
        { transaction },
      );
      await this.membershipService.grant(event.id, hostId, MembershipRole.HOST, transaction);
      const stops = await this.replaceStops(event.id, stopIds, transaction);

      const invites = await this.inviteService.createInvites(
        event.id,
        hostId,
        dto.inviteeIds ?? [],
        transaction,
      );
      if (!invites.ok) {
        return invites;
      }

      this.logger.log(`Event ${event.id} (${event.slug}) created by user ${hostId}`);
      return ok({ event, stops, invites: invites.value });
    });
  }

  /**
   * Host only. Stops are replaced wholesale when `stopLocationIds` is given;
   * `inviteeIds` only ever adds invites. The slug never changes.
   */
  async updateEvent(
    eventId: number,
    actorId: number,
    input: UpdateEventInput,
  ): Promise<Result<SavedEvent>> {
    const validated = await validateDto(UpdateEventDto, input);
    if (!validated.ok) {
      return validated;
    }
    const dto = validated.value;

    const stopIds = dto.stopLocationIds === undefined ? undefined : dedupeIds(dto.stopLocationIds);
    const locationIds = [
      ...(dto.startLocationId === undefined ? [] : [dto.startLocationId]),
      ...(stopIds ?? []),
    ];
    const locations = await this.verifyLocations(locationIds);
    if (!locations.ok) {
      return locations;
    }

    return runInTransaction(this.sequelize, async (transaction) => {
      const event = await this.eventModel.findByPk(eventId, { transaction });
      if (!event || event.isDeleted) {
        return fail('NotFound', 'Event not found.');
      }
      if (event.hostId !== actorId) {
        return fail('Forbidden', 'Only the host can edit this event.');
      }

      const changes = this.editableFields(dto);
      if (Object.keys(changes).length > 0) {
        await event.update(changes, { transaction });
      }

      const stops =
        stopIds === undefined
          ? await this.listStops(event.id, transaction)
          : await this.replaceStops(event.id, stopIds, transaction);

      const invites = await this.inviteService.createInvites(
        event.id,
        actorId,
        dto.inviteeIds ?? [],
        transaction,
      );
      if (!invites.ok) {
        return invites;
      }

      this.logger.log(`Event ${event.id} updated by host ${actorId}`);
      return ok({ event, stops, invites: invites.value });
    });
  }

  /** Soft delete; the row and everything hanging off it stay in place. */
  async deleteEvent(eventId: number, actorId: number): Promise<Result<Event>> {
    return runInTransaction(this.sequelize, async (transaction) => {
      const event = await this.eventModel.findByPk(eventId, {
        transaction,
        lock: Transaction.LOCK.UPDATE,
      });
      if (!event || event.isDeleted) {
        return fail('NotFound', 'Event not found.');
      }
      if (event.hostId !== actorId) {
        return fail('Forbidden', 'Only the host can delete this event.');
      }

      await event.update({ isDeleted: true }, { transaction });
      this.logger.log(`Event ${event.id} deleted by host ${actorId}`);
      return ok(event);
    });
  }

  /** Events the viewer may not see are reported exactly like missing ones. */
  async getEventBySlug(slug: string, viewerId: number): Promise<Result<EventWithStops>> {
    const event = await this.eventModel.findOne({ where: { slug } });
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }

    const relationship = await this.membershipService.getRelationship(event, viewerId);
    if (!canView(event, relationship)) {
      return fail('NotFound', 'Event not found.');
    }

    return ok({ event, stops: await this.listStops(event.id) });
  }

  async listPublicEvents(filters: PublicEventFilters = {}): Promise<Event[]> {
    const tiers =
      filters.visibility === 'open'
        ? [EventVisibility.PUBLIC_OPEN]
        : filters.visibility === 'invite'
          ? [EventVisibility.PUBLIC_INVITE]
          : [EventVisibility.PUBLIC_OPEN, EventVisibility.PUBLIC_INVITE];
    const query = filters.query?.trim();

    return this.eventModel.findAll({
      where: {
        isDeleted: false,
        visibility: { [Op.in]: tiers },
        ...(query ? { title: { [Op.iLike]: `%${escapeLike(query)}%` } } : {}),
      },
      order: [
        ['startTime', filters.order === '-start_time' ? 'DESC' : 'ASC'],
        ['id', 'ASC'],
      ],
    });
  }

  private editableFields(dto: UpdateEventDto): EditableFields {
    const changes: EditableFields = {};
    if (dto.title !== undefined) changes.title = dto.title;
    if (dto.description !== undefined) changes.description = dto.description;
    if (dto.visibility !== undefined) changes.visibility = dto.visibility;
    if (dto.startTime !== undefined) changes.startTime = dto.startTime;
    if (dto.startLocationId !== undefined) changes.startLocationId = dto.startLocationId;
    return changes;
  }

  private async verifyLocations(locationIds: number[]): Promise<Result<void>> {
    const ids = dedupeIds(locationIds);
    if (ids.length === 0) {
      return ok(undefined);
    }
    const known = await this.locationDirectory.existing(ids);
    if (ids.some((id) => !known.has(id))) {
      return fail('ValidationError', 'One or more locations are invalid.');
    }
    return ok(undefined);
  }

  private async replaceStops(
    eventId: number,
    locationIds: number[],
    transaction: Transaction,
  ): Promise<EventStop[]> {
    await this.stopModel.destroy({ where: { eventId }, transaction });
    if (locationIds.length === 0) {
      return [];
    }
    return this.stopModel.bulkCreate(
      locationIds.map((locationId, index) => ({ eventId, locationId, order: index + 1 })),
      { transaction },
    );
  }

  private listStops(eventId: number, transaction?: Transaction): Promise<EventStop[]> {
    return this.stopModel.findAll({
      where: { eventId },
      order: [['order', 'ASC']],
      transaction,
    });
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
