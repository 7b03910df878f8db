import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  CreatedAt,
  DataType,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
} from 'sequelize-typescript';
import { Event } from '../../event/model/event.model';

export interface EventFavoriteAttributes {
  id: number;
  eventId: number;
  userId: number;
  createdAt: Date;
}

export type EventFavoriteCreationAttributes = Optional<
  EventFavoriteAttributes,
  'id' | 'createdAt'
>;

@Table({
  tableName: 'ev_event_favorite',
  updatedAt: false,
  indexes: [
    {
      name: 'ev_event_favorite_event_user_unique',
      unique: true,
      fields: ['eventId', 'userId'],
    },
  ],
})
export class EventFavorite
  extends Model<EventFavoriteAttributes, EventFavoriteCreationAttributes>
  implements EventFavoriteAttributes
{
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  id!: number;

  @ForeignKey(() => Event)
  @Column({ type: DataType.INTEGER, allowNull: false })
  eventId!: number;

  @BelongsTo(() => Event, { onDelete: 'CASCADE' })
  event?: Event;

  @Column({ type: DataType.INTEGER, allowNull: false })
  userId!: number;

  @CreatedAt
  createdAt!: Date;
}
