import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { runInTransaction } from '../common/utils/transaction.util';
import { isUniqueConstraintError } from '../common/utils/unique-constraint.util';
import { Event } from '../event/model/event.model';
import { EventFavorite } from './model/event-favorite.model';

export interface FavoriteOutcome {
  favorite: EventFavorite;
  created: boolean;
}

export interface FavoritedEvent {
  event: Event;
  favoritedAt: Date;
}

@Injectable()
export class FavoriteService {
  private readonly logger = new Logger(FavoriteService.name);

  constructor(
    @InjectModel(EventFavorite)
    private readonly favoriteModel: typeof EventFavorite,
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    private readonly sequelize: Sequelize,
  ) {}

  /**
   * Idempotent; `created` tells whether this call added the row. The event row
   * is share-locked so a concurrent delete cannot slip in before the insert.
   */
  async favorite(eventId: number, userId: number): Promise<Result<FavoriteOutcome>> {
    try {
      return await runInTransaction(this.sequelize, async (transaction) => {
        const event = await this.eventModel.findByPk(eventId, {
          transaction,
          lock: Transaction.LOCK.SHARE,
        });
        if (!event) {
          return fail('NotFound', 'Event not found.');
        }
        if (event.isDeleted) {
          return fail('CannotFavoriteDeleted', 'A deleted event cannot be favorited.');
        }

        const [favorite, created] = await this.favoriteModel.findOrCreate({
          where: { eventId, userId },
          defaults: { eventId, userId },
          transaction,
        });
        return ok({ favorite, created });
      });
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      const favorite = await this.favoriteModel.findOne({ where: { eventId, userId } });
      if (!favorite) {
        throw error;
      }
      this.logger.warn(`Favorite race on event ${eventId} for user ${userId}`);
      return ok({ favorite, created: false });
    }
  }

  async unfavorite(eventId: number, userId: number): Promise<Result<{ removed: boolean }>> {
    const removed = await this.favoriteModel.destroy({ where: { eventId, userId } });
    return ok({ removed: removed > 0 });
  }

  async isFavorited(eventId: number, userId: number): Promise<boolean> {
    const count = await this.favoriteModel.count({ where: { eventId, userId } });
    return count > 0;
  }

  /** Live events only, most recently favorited first. */
  async listFavorites(userId: number): Promise<FavoritedEvent[]> {
    const favorites = await this.favoriteModel.findAll({
      where: { userId },
      order: [
        ['createdAt', 'DESC'],
        ['id', 'DESC'],
      ],
    });
    if (favorites.length === 0) {
      return [];
    }

    const events = await this.eventModel.findAll({
      where: { id: { [Op.in]: favorites.map((favorite) => favorite.eventId) }, isDeleted: false },
    });
    const eventsById = new Map(events.map((event): [number, Event] => [event.id, event]));

    return favorites.flatMap((favorite) => {
      const event = eventsById.get(favorite.eventId);
      return event ? [{ event, favoritedAt: favorite.createdAt }] : [];
    });
  }
}
