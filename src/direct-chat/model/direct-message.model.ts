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
} from 'sequelize-typescript';
import { DirectChat } from './direct-chat.model';

export interface DirectMessageAttributes {
  id: number;
  chatId: number;
  senderId: number;
  content: string;
  isRead: boolean;
  createdAt: Date;
}

export type DirectMessageCreationAttributes = Optional<
  DirectMessageAttributes,
  'id' | 'isRead' | 'createdAt'
>;

@Table({
  tableName: 'ev_direct_message',
  updatedAt: false,
  indexes: [{ name: 'ev_direct_message_chat_created', fields: ['chatId', 'createdAt'] }],
})
export class DirectMessage
  extends Model<DirectMessageAttributes, DirectMessageCreationAttributes>
  implements DirectMessageAttributes
{
  @PrimaryKey
  @AutoIncrement
  @Column(DataType.INTEGER)
  id!: number;

  @ForeignKey(() => DirectChat)
  @Column({ type: DataType.INTEGER, allowNull: false })
  chatId!: number;

  @BelongsTo(() => DirectChat, { onDelete: 'CASCADE' })
  chat?: DirectChat;

  @Column({ type: DataType.INTEGER, allowNull: false })
  senderId!: number;

  @Column({ type: DataType.STRING(500), allowNull: false })
  content!: string;

  @Default(false)
  @Column({ type: DataType.BOOLEAN, allowNull: false })
  isRead!: boolean;

  @CreatedAt
  createdAt!: Date;
}
