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
import { EventChatMessage } from './event-chat-message.model';

export enum MessageReportReason {
  SPAM = 'SPAM',
  HARASSMENT = 'HARASSMENT',
  INAPPROPRIATE = 'INAPPROPRIATE',
  OTHER = 'OTHER',
}

export enum MessageReportStatus {
  PENDING = 'PENDING',
  REVIEWED = 'REVIEWED',
  DISMISSED = 'DISMISSED',
}

export interface MessageReportAttributes {
  id: number;
  messageId: number;
  reporterId: number;
  reason: MessageReportReason;
  description: string | null;
  status: MessageReportStatus;
  createdAt: Date;
  updatedAt: Date;
}

export type MessageReportCreationAttributes = Optional<
  MessageReportAttributes,
  'id' | 'description' | 'status' | 'createdAt' | 'updatedAt'
>;

@Table({
  tableName: 'ev_message_report',
  indexes: [
    {
      name: 'ev_message_report_message_reporter_unique',
      unique: true,
      fields: ['messageId', 'reporterId'],
    },
  ],
})
export class MessageReport
  extends Model<MessageReportAttributes, MessageReportCreationAttributes>
  implements MessageReportAttributes
{
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  id!: number;

  @ForeignKey(() => EventChatMessage)
  @Column({ type: DataType.INTEGER, allowNull: false })
  messageId!: number;

  @BelongsTo(() => EventChatMessage, { onDelete: 'CASCADE' })
  chatMessage?: EventChatMessage;

  @Column({ type: DataType.INTEGER, allowNull: false })
  reporterId!: number;

  @Column({
    type: DataType.ENUM(...Object.values(MessageReportReason)),
    allowNull: false,
  })
  reason!: MessageReportReason;

  @Column({ type: DataType.STRING(500), allowNull: true })
  description!: string | null;

  // moderators move reports out of PENDING from the admin tooling
  @Default(MessageReportStatus.PENDING)
  @Column({
    type: DataType.ENUM(...Object.values(MessageReportStatus)),
    allowNull: false,
  })
  status!: MessageReportStatus;

  @CreatedAt
  createdAt!: Date;

  @UpdatedAt
  updatedAt!: Date;
}
