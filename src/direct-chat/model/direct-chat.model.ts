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
  UpdatedAt,
} from 'sequelize-typescript';
import { Event } from '../../event/model/event.model';

export interface DirectChatAttributes {
  id: number;
  eventId: number;
  user1Id: number;
  user2Id: number;
  createdAt: Date;
  updatedAt: Date;
}

export type DirectChatCreationAttributes = Optional<
  DirectChatAttributes,
  'id' | 'createdAt' | 'updatedAt'
>;

/**
 * 1:1 conversation scoped to an event. The pair is stored lower id first
 * (`user1Id < user2Id`) so one lookup finds it from either side.
 */
@Table({
  tableName: 'ev_direct_chat',
  indexes: [
    {
      name: 'ev_direct_chat_event_pair_unique',
      unique: true,
      fields: ['eventId', 'user1Id', 'user2Id'],
    },
  ],
})
export class DirectChat
  extends Model<DirectChatAttributes, DirectChatCreationAttributes>
  implements DirectChatAttributes
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
  user1Id!: number;

  @Column({ type: DataType.INTEGER, allowNull: false })
  user2Id!: number;

  @CreatedAt
  createdAt!: Date;

  /** Bumped on every message; drives "most recently active" ordering. */
  @UpdatedAt
  updatedAt!: Date;
}
