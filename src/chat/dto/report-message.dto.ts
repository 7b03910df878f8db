import { Transform } from 'class-transformer';
import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { MessageReportReason } from '../model/message-report.model';

export const REPORT_DESCRIPTION_MAX_LENGTH = 500;

export class ReportMessageDto {
  @IsEnum(MessageReportReason, {
    message: `reason must be one of: ${Object.values(MessageReportReason).join(', ')}`,
  })
  reason!: MessageReportReason;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @MaxLength(REPORT_DESCRIPTION_MAX_LENGTH)
  description?: string;
}
