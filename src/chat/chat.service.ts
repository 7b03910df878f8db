import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/sequelize';
import { Op, Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Result, fail, ok } from '../common/result';
import { isWithinLength } from '../common/utils/text.util';
import { runInTransaction } from '../common/utils/transaction.util';
import { isUniqueConstraintError } from '../common/utils/unique-constraint.util';
import { validateDto } from '../common/utils/validate-dto.util';
import { EngagementConfig, engagementConfig } from '../config/engagement.config';
import { Event } from '../event/model/event.model';
import { MembershipService } from '../membership/membership.service';
import { ReportMessageDto } from './dto/report-message.dto';
import { EventChatMessage } from './model/event-chat-message.model';
import { MessageReport } from './model/message-report.model';

/**
 * Per-event group chat. Only HOST and ATTENDEE members may read or post, and
 * each event keeps its most recent `chatRetentionLimit` messages.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    @InjectModel(EventChatMessage)
    private readonly chatMessageModel: typeof EventChatMessage,
    @InjectModel(MessageReport)
    private readonly reportModel: typeof MessageReport,
    @InjectModel(Event)
    private readonly eventModel: typeof Event,
    @Inject(engagementConfig.KEY)
    private readonly config: EngagementConfig,
    private readonly membershipService: MembershipService,
    private readonly sequelize: Sequelize,
  ) {}

  async post(eventId: number, authorId: number, text: string): Promise<Result<EventChatMessage>> {
    const event = await this.eventModel.findByPk(eventId);
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }
    if (!(await this.membershipService.userHasJoined(eventId, authorId))) {
      return fail('NotAMember', 'Only members of this event can use its chat.');
    }

    const message = text.trim();
    const maxLength = this.config.chatMessageMaxLength;
    if (!isWithinLength(message, 1, maxLength)) {
      return fail('InvalidMessage', `Message must be between 1 and ${maxLength} characters.`);
    }

    return runInTransaction(this.sequelize, async (transaction) => {
      const created = await this.chatMessageModel.create(
        { eventId, authorId, message },
        { transaction },
      );
      await this.enforceRetention(eventId, transaction);
      return ok(created);
    });
  }

  /** The latest `limit` messages, oldest first. */
  async listMessages(
    eventId: number,
    viewerId: number,
    limit: number = this.config.chatRetentionLimit,
  ): Promise<Result<EventChatMessage[]>> {
    if (!Number.isInteger(limit) || limit < 1) {
      return fail('ValidationError', 'limit must be a positive integer.');
    }
    const event = await this.eventModel.findByPk(eventId);
    if (!event || event.isDeleted) {
      return fail('NotFound', 'Event not found.');
    }
    if (!(await this.membershipService.userHasJoined(eventId, viewerId))) {
      return fail('NotAMember', 'Only members of this event can use its chat.');
    }

    const latest = await this.chatMessageModel.findAll({
      where: { eventId },
      order: [
        ['createdAt', 'DESC'],
        ['id', 'DESC'],
      ],
      limit,
    });
    return ok(latest.reverse());
  }

  async reportMessage(
    messageId: number,
    reporterId: number,
    input: { reason: string; description?: string },
  ): Promise<Result<MessageReport>> {
    const validated = await validateDto(ReportMessageDto, input);
    if (!validated.ok) {
      return validated;
    }

    const message = await this.chatMessageModel.findByPk(messageId);
    if (!message) {
      return fail('NotFound', 'Message not found.');
    }
    if (!(await this.membershipService.userHasJoined(message.eventId, reporterId))) {
      return fail('NotAMember', 'Only members of this event can report its messages.');
    }
    if (message.authorId === reporterId) {
      return fail('Forbidden', 'You cannot report your own message.');
    }

    const existing = await this.reportModel.findOne({ where: { messageId, reporterId } });
    if (existing) {
      return fail('AlreadyReported', 'You have already reported this message.');
    }

    try {
      const report = await this.reportModel.create({
        messageId,
        reporterId,
        reason: validated.value.reason,
        description: validated.value.description ?? null,
      });
      this.logger.log(`Message ${messageId} reported by user ${reporterId} (${report.reason})`);
      return ok(report);
    } catch (error) {
      if (!isUniqueConstraintError(error)) {
        throw error;
      }
      return fail('AlreadyReported', 'You have already reported this message.');
    }
  }

  // Not serialized against concurrent posts: the log can briefly hold more
  // than the limit until the next post trims it again.
  private async enforceRetention(eventId: number, transaction: Transaction): Promise<void> {
    const limit = this.config.chatRetentionLimit;
    const total = await this.chatMessageModel.count({ where: { eventId }, transaction });
    if (total <= limit) {
      return;
    }

    const stale = await this.chatMessageModel.findAll({
      where: { eventId },
      attributes: ['id'],
      order: [
        ['createdAt', 'DESC'],
        ['id', 'DESC'],
      ],
      offset: limit,
      transaction,
    });
    const removed = await this.chatMessageModel.destroy({
      where: { id: { [Op.in]: stale.map((row) => row.id) } },
      transaction,
    });
    this.logger.log(`Trimmed ${removed} message(s) from event ${eventId} chat`);
  }
}
