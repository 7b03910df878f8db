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

export enum JoinRequestStatus {
  PENDING = 'PENDING',
  APPROVED = 'APPROVED',
  DECLINED = 'DECLINED',
}

export interface EventJoinRequestAttributes {
  id: number;
  eventId: number;
  requesterId: number;
  status: JoinRequestStatus;
  decidedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type EventJoinRequestCreationAttributes = Optional<
  EventJoinRequestAttributes,
  'id' | 'status' | 'decidedAt' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'ev_event_join_request',
  indexes: [
    {
      name: 'ev_event_join_request_event_requester_unique',
      unique: true,
      fields: ['eventId', 'requesterId'],
    },
  ],
})
export class EventJoinRequest
  extends Model<EventJoinRequestAttributes, EventJoinRequestCreationAttributes>
  implements EventJoinRequestAttributes
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
  requesterId!: number;

  @Default(JoinRequestStatus.PENDING)
  @Column({
    type: DataType.ENUM(...Object.values(JoinRequestStatus)),
    allowNull: false,
  })
  status!: JoinRequestStatus;

  @Column({ type: DataType.DATE, allowNull: true })
  decidedAt!: Date | null;

  @CreatedAt
  createdAt!: Date;

  @UpdatedAt
  updatedAt!: Date;
}
