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

export enum MembershipRole {
  HOST = 'HOST',
  ATTENDEE = 'ATTENDEE',
  INVITED = 'INVITED',
}

export interface EventMembershipAttributes {
  id: number;
  eventId: number;
  userId: number;
  role: MembershipRole;
  createdAt: Date;
  updatedAt: Date;
}

export type EventMembershipCreationAttributes = Optional<
  EventMembershipAttributes,
  'id' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'ev_event_membership',
  indexes: [
    {
      name: 'ev_event_membership_event_user_unique',
      unique: true,
      fields: ['eventId', 'userId'],
    },
  ],
})
export class EventMembership
  extends Model<EventMembershipAttributes, EventMembershipCreationAttributes>
  implements EventMembershipAttributes
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

  @Column({
    type: DataType.ENUM(...Object.values(MembershipRole)),
    allowNull: false,
  })
  role!: MembershipRole;

  /** Doubles as the joined-at time for HOST and ATTENDEE rows. */
  @CreatedAt
  createdAt!: Date;

  @UpdatedAt
  updatedAt!: Date;
}
