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

export interface EventChatMessageAttributes {
  id: number;
  eventId: number;
  authorId: number;
  message: string;
  createdAt: Date;
}

export type EventChatMessageCreationAttributes = Optional<
  EventChatMessageAttributes,
  'id' | 'createdAt'
>;

@Table({
  tableName: 'ev_event_chat_message',
  updatedAt: false,
  indexes: [{ name: 'ev_event_chat_message_event_created', fields: ['eventId', 'createdAt'] }],
})
export class EventChatMessage
  extends Model<EventChatMessageAttributes, EventChatMessageCreationAttributes>
  implements EventChatMessageAttributes
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
  authorId!: number;

  @Column({ type: DataType.STRING(300), allowNull: false })
  message!: string;

  @CreatedAt
  createdAt!: Date;
}
