import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  DataType,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
} from 'sequelize-typescript';
import { Event } from './event.model';

export interface EventStopAttributes {
  id: number;
  eventId: number;
  locationId: number;
  order: number;
}

export type EventStopCreationAttributes = Optional<EventStopAttributes, 'id'>;

/** Waypoint after the start location; `order` starts at 1. */
@Table({
  tableName: 'ev_event_stop',
  timestamps: false,
  indexes: [
    { name: 'ev_event_stop_order_unique', unique: true, fields: ['eventId', 'order'] },
    { name: 'ev_event_stop_location_unique', unique: true, fields: ['eventId', 'locationId'] },
  ],
})
export class EventStop
  extends Model<EventStopAttributes, EventStopCreationAttributes>
  implements EventStopAttributes
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
  locationId!: number;

  @Column({ type: DataType.INTEGER, allowNull: false })
  order!: number;
}
