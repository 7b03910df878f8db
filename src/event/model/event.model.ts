import { Optional } from 'sequelize';
import {
  AutoIncrement,
  Column,
  CreatedAt,
  DataType,
  Default,
  Model,
  PrimaryKey,
  Table,
  UpdatedAt,
} from 'sequelize-typescript';

export enum EventVisibility {
  PUBLIC_OPEN = 'PUBLIC_OPEN',
  PUBLIC_INVITE = 'PUBLIC_INVITE',
  PRIVATE = 'PRIVATE',
}

export interface EventAttributes {
  id: number;
  slug: string;
  title: string;
  description: string | null;
  hostId: number;
  visibility: EventVisibility;
  startTime: Date;
  startLocationId: number;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type EventCreationAttributes = Optional<
  EventAttributes,
  'id' | 'description' | 'isDeleted' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'ev_event',
  indexes: [
    { name: 'ev_event_slug_unique', unique: true, fields: ['slug'] },
    { name: 'ev_event_visibility_start', fields: ['visibility', 'startTime'] },
  ],
})
export class Event
  extends Model<EventAttributes, EventCreationAttributes>
  implements EventAttributes
{
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  id!: number;

  @Column({ type: DataType.STRING(80), allowNull: false })
  slug!: string;

  @Column({ type: DataType.STRING(80), allowNull: false })
  title!: string;

  @Column({ type: DataType.STRING(300), allowNull: true })
  description!: string | null;

  // auth_user.id, owned by the account service
  @Column({ type: DataType.INTEGER, allowNull: false })
  hostId!: number;

  @Default(EventVisibility.PUBLIC_OPEN)
  @Column({
    type: DataType.ENUM(...Object.values(EventVisibility)),
    allowNull: false,
  })
  visibility!: EventVisibility;

  @Column({ type: DataType.DATE, allowNull: false })
  startTime!: Date;

  // location catalog id
  @Column({ type: DataType.INTEGER, allowNull: false })
  startLocationId!: number;

  @Default(false)
  @Column({ type: DataType.BOOLEAN, allowNull: false })
  isDeleted!: boolean;

  @CreatedAt
  createdAt!: Date;

  @UpdatedAt
  updatedAt!: Date;
}
