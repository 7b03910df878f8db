import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { isWithinLength } from '../common/utils/text.util';
import { runInTransaction } from '../common/utils/transaction.util';
import { isUniqueConstraintError } from '../common/utils/unique-constraint.util';
import { EngagementConfig, engagementConfig } from '../config/engagement.config';
import { USER_DIRECTORY, UserDirectory } from '../directory/directory.interfaces';
import { Event } from '../event/model/event.model';
import { MembershipService } from '../membership/membership.service';
import { isParticipant, normalizePair, otherParticipant } from './direct-chat.util';
import { DirectChat } from './model/direct-chat.model';
import { DirectChatLeave } from './model/direct-chat-leave.model';
import { DirectMessage } from './model/direct-message.model';

@Injectable()
export class DirectChatService {
  private readonly logger = new Logger(DirectChatService.name);

  constructor(
    @InjectModel(DirectChat)
    private readonly chatModel: typeof DirectChat,
    @InjectModel(DirectMessage)
    private readonly messageModel: typeof DirectMessage,
    @InjectModel(DirectChatLeave)
    private readonly leaveModel: typeof DirectChatLeave,
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectory,
    @Inject(engagementConfig.KEY)
    private readonly config: EngagementConfig,
    private readonly membershipService: MembershipService,
    private readonly sequelize: Sequelize,
  ) {}

  /** Both users must have joined the event (HOST or ATTENDEE). */
  async getOrCreateChat(
    eventId: number,
    userAId: number,
    userBId: number,
  ): Promise<Result<DirectChat>> {
    if (userAId === userBId) {
      return fail('ValidationError', 'You cannot start a chat with yourself.');
    }

    const event = await this.eventModel.findByPk(eventId);
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }

    const known = await this.userDirectory.existing([userAId, userBId]);
    if (!known.has(userAId) || !known.has(userBId)) {
      return fail('NotFound', 'User not found.');
    }

    const [aJoined, bJoined] = await Promise.all([
      this.membershipService.userHasJoined(eventId, userAId),
      this.membershipService.userHasJoined(eventId, userBId),
    ]);
    if (!aJoined || !bJoined) {
      return fail('Forbidden', 'Both users must be members of the event to chat.');
    }

    const pair = normalizePair(userAId, userBId);
    try {
      const [chat, created] = await this.chatModel.findOrCreate({
        where: { eventId, ...pair },
        defaults: { eventId, ...pair },
      });
      if (created) {
        this.logger.log(`Direct chat ${chat.id} opened on event ${eventId}`);
      }
      return ok(chat);
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      const existing = await this.chatModel.findOne({ where: { eventId, ...pair } });
      if (!existing) {
        throw error;
      }
      this.logger.warn(`Direct chat race on event ${eventId}, reusing chat ${existing.id}`);
      return ok(existing);
    }
  }

  /**
   * Sending brings a recipient who left the chat back into it.
   */
  async send(chatId: number, senderId: number, text: string): Promise<Result<DirectMessage>> {
    const chat = await this.chatModel.findByPk(chatId);
    if (!chat) {
      return fail('NotFound', 'Chat not found.');
    }
    const recipientId = otherParticipant(chat, senderId);
    if (recipientId === null) {
      return fail('Forbidden', 'You are not a participant in this chat.');
    }

    const content = text.trim();
    const maxLength = this.config.directMessageMaxLength;
    if (!isWithinLength(content, 1, maxLength)) {
      return fail('InvalidMessage', `Message must be between 1 and ${maxLength} characters.`);
    }

    return runInTransaction(this.sequelize, async (transaction) => {
      const message = await this.messageModel.create({ chatId, senderId, content }, { transaction });

      chat.changed('updatedAt', true);
      await chat.save({ transaction });

      const rejoined = await this.leaveModel.destroy({
        where: { chatId, userId: recipientId },
        transaction,
      });
      if (rejoined > 0) {
        this.logger.log(`User ${recipientId} rejoined direct chat ${chatId}`);
      }
      return ok(message);
    });
  }

  /** Hides the chat for `userId`; the chat and its messages stay. */
  async leave(chatId: number, userId: number): Promise<Result<DirectChatLeave>> {
    const chat = await this.chatModel.findByPk(chatId);
    if (!chat) {
      return fail('NotFound', 'Chat not found.');
    }
    if (!isParticipant(chat, userId)) {
      return fail('Forbidden', 'You are not a participant in this chat.');
    }

    const existing = await this.leaveModel.findOne({ where: { chatId, userId } });
    if (existing) {
      return fail('AlreadyLeft', 'You have already left this chat.');
    }

    try {
      const leave = await this.leaveModel.create({ chatId, userId });
      this.logger.log(`User ${userId} left direct chat ${chatId}`);
      return ok(leave);
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      return fail('AlreadyLeft', 'You have already left this chat.');
    }
  }

  async activeParticipants(chatId: number): Promise<Result<number[]>> {
    const chat = await this.chatModel.findByPk(chatId);
    if (!chat) {
      return fail('NotFound', 'Chat not found.');
    }

    const leaves = await this.leaveModel.findAll({ where: { chatId } });
    const left = new Set(leaves.map((leave) => leave.userId));
    return ok([chat.user1Id, chat.user2Id].filter((userId) => !left.has(userId)));
  }

  /** Oldest first. Reading marks the other participant's messages as read. */
  async listMessages(chatId: number, userId: number): Promise<Result<DirectMessage[]>> {
    const chat = await this.chatModel.findByPk(chatId);
    if (!chat) {
      return fail('NotFound', 'Chat not found.');
    }
    if (!isParticipant(chat, userId)) {
      return fail('Forbidden', 'You are not a participant in this chat.');
    }

    await this.messageModel.update(
      { isRead: true },
      { where: { chatId, senderId: { [Op.ne]: userId }, isRead: false } },
    );
    const messages = await this.messageModel.findAll({
      where: { chatId },
      order: [
        ['createdAt', 'ASC'],
        ['id', 'ASC'],
      ],
    });
    return ok(messages);
  }

  async unreadCount(chatId: number, userId: number): Promise<Result<number>> {
    const chat = await this.chatModel.findByPk(chatId);
    if (!chat) {
      return fail('NotFound', 'Chat not found.');
    }
    if (!isParticipant(chat, userId)) {
      return fail('Forbidden', 'You are not a participant in this chat.');
    }

    const unread = await this.messageModel.count({
      where: { chatId, senderId: { [Op.ne]: userId }, isRead: false },
    });
    return ok(unread);
  }

  /** Chats the user is still in, most recently active first. */
  async listChatsForUser(eventId: number, userId: number): Promise<DirectChat[]> {
    const leaves = await this.leaveModel.findAll({ where: { userId } });
    const leftChatIds = leaves.map((leave) => leave.chatId);

    return this.chatModel.findAll({
      where: {
        eventId,
        [Op.or]: [{ user1Id: userId }, { user2Id: userId }],
        ...(leftChatIds.length > 0 ? { id: { [Op.notIn]: leftChatIds } } : {}),
      },
      order: [
        ['updatedAt', 'DESC'],
        ['id', 'DESC'],
      ],
    });
  }
}
