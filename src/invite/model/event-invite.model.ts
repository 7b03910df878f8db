import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  CreatedAt,
  DataType,
  Default,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
  UpdatedAt,
} from 'sequelize-typescript';
import { Event } from '../../event/model/event.model';

export enum InviteStatus {
  PENDING = 'PENDING',
  ACCEPTED = 'ACCEPTED',
  DECLINED = 'DECLINED',
  // reserved; nothing assigns it yet
  EXPIRED = 'EXPIRED',
}

export interface EventInviteAttributes {
  id: number;
  eventId: number;
  inviteeId: number;
  invitedById: number;
  status: InviteStatus;
  respondedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type EventInviteCreationAttributes = Optional<
  EventInviteAttributes,
  'id' | 'status' | 'respondedAt' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'ev_event_invite',
  indexes: [
    {
      name: 'ev_event_invite_event_invitee_unique',
      unique: true,
      fields: ['eventId', 'inviteeId'],
    },
  ],
})
export class EventInvite
  extends Model<EventInviteAttributes, EventInviteCreationAttributes>
  implements EventInviteAttributes
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
  inviteeId!: number;

  @Column({ type: DataType.INTEGER, allowNull: false })
  invitedById!: number;

  @Default(InviteStatus.PENDING)
  @Column({
    type: DataType.ENUM(...Object.values(InviteStatus)),
    allowNull: false,
  })
  status!: InviteStatus;

  /** Null exactly while the invite is PENDING. */
  @Column({ type: DataType.DATE, allowNull: true })
  respondedAt!: Date | null;

  @CreatedAt
  createdAt!: Date;

  @UpdatedAt
  updatedAt!: Date;
}
