import { Optional } from 'sequelize';
import {
  AutoIncrement,
  BelongsTo,
  Column,
  DataType,
  Default,
  ForeignKey,
  Model,
  PrimaryKey,
  Table,
} from 'sequelize-typescript';
import { DirectChat } from './direct-chat.model';

export interface DirectChatLeaveAttributes {
  id: number;
  chatId: number;
  userId: number;
  leftAt: Date;
}

export type DirectChatLeaveCreationAttributes = Optional<
  DirectChatLeaveAttributes,
  'id' | 'leftAt'
>;

/**
 * Marks a participant who hid the chat. The chat and its messages stay; the
 * row goes away again when the other participant sends a message.
 */
@Table({
  tableName: 'ev_direct_chat_leave',
  timestamps: false,
  indexes: [
    {
      name: 'ev_direct_chat_leave_chat_user_unique',
      unique: true,
      fields: ['chatId', 'userId'],
    },
  ],
})
export class DirectChatLeave
  extends Model<DirectChatLeaveAttributes, DirectChatLeaveCreationAttributes>
  implements DirectChatLeaveAttributes
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
  userId!: number;

  @Default(DataType.NOW)
  @Column({ type: DataType.DATE, allowNull: false })
  leftAt!: Date;
}
