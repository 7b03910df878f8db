import { Transform, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsDate,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
  ValidateBy,
  ValidationOptions,
  buildMessage,
} from 'class-validator';
import dayjs from 'dayjs';
import { EventVisibility } from '../model/event.model';

export const EVENT_TITLE_MAX_LENGTH = 80;
export const EVENT_DESCRIPTION_MAX_LENGTH = 300;
export const EVENT_MAX_STOPS = 5;

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

/** Valid date strictly after the moment of validation. */
export function IsFutureDate(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isFutureDate',
      validator: {
        validate: (value: unknown) =>
          value instanceof Date && dayjs(value).isValid() && dayjs(value).isAfter(dayjs()),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a date in the future`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

export class CreateEventDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(EVENT_TITLE_MAX_LENGTH)
  title!: string;

  @IsOptional()
  @IsString()
  @MaxLength(EVENT_DESCRIPTION_MAX_LENGTH)
  description?: string | null;

  @IsOptional()
  @IsEnum(EventVisibility)
  visibility?: EventVisibility;

  @Type(() => Date)
  @IsDate()
  @IsFutureDate()
  startTime!: Date;

  @IsInt()
  @IsPositive()
  startLocationId!: number;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(EVENT_MAX_STOPS)
  @Type(() => Number)
  @IsInt({ each: true })
  @IsPositive({ each: true })
  stopLocationIds?: number[];

  @IsOptional()
  @IsArray()
  @Type(() => Number)
  @IsInt({ each: true })
  @IsPositive({ each: true })
  inviteeIds?: number[];
}

/** Same rules as creation; every field may be left out. */
export class UpdateEventDto {
  @IsOptional()
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(EVENT_TITLE_MAX_LENGTH)
  title?: string;

  @IsOptional()
  @IsString()
  @MaxLength(EVENT_DESCRIPTION_MAX_LENGTH)
  description?: string | null;

  @IsOptional()
  @IsEnum(EventVisibility)
  visibility?: EventVisibility;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  @IsFutureDate()
  startTime?: Date;

  @IsOptional()
  @IsInt()
  @IsPositive()
  startLocationId?: number;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(EVENT_MAX_STOPS)
  @Type(() => Number)
  @IsInt({ each: true })
  @IsPositive({ each: true })
  stopLocationIds?: number[];

  @IsOptional()
  @IsArray()
  @Type(() => Number)
  @IsInt({ each: true })
  @IsPositive({ each: true })
  inviteeIds?: number[];
}

/** Plain input accepted by `EventService.createEvent`. */
export interface CreateEventInput {
  title: string;
  description?: string | null;
  visibility?: EventVisibility | string;
  startTime: Date | string;
  startLocationId: number;
  stopLocationIds?: number[];
  inviteeIds?: number[];
}

export type UpdateEventInput = Partial<CreateEventInput>;
