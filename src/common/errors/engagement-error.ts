import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import type { Result } from '../result';

export type EngagementErrorKind =
  // malformed input
  | 'ValidationError'
  | 'InvalidMessage'
  // idempotency boundaries, informational
  | 'AlreadyJoined'
  | 'AlreadyInvited'
  | 'AlreadyMember'
  | 'AlreadyLeft'
  | 'AlreadyReported'
  // policy denials
  | 'PrivateEvent'
  | 'InviteRequired'
  | 'Forbidden'
  | 'NotAMember'
  | 'NotRegistered'
  | 'HostCannotLeave'
  | 'CannotFavoriteDeleted'
  | 'NotFound';

export interface EngagementError {
  kind: EngagementErrorKind;
  message: string;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

/**
 * Maps a domain error onto the NestJS exception a controller would raise.
 */
export function toHttpException(error: EngagementError): HttpException {
  switch (error.kind) {
    case 'ValidationError':
    case 'InvalidMessage':
      return new BadRequestException(error.message);
    case 'AlreadyJoined':
    case 'AlreadyInvited':
    case 'AlreadyMember':
    case 'AlreadyLeft':
    case 'AlreadyReported':
      return new ConflictException(error.message);
    case 'PrivateEvent':
    case 'InviteRequired':
    case 'Forbidden':
    case 'NotAMember':
    case 'NotRegistered':
    case 'HostCannotLeave':
    case 'CannotFavoriteDeleted':
      return new ForbiddenException(error.message);
    case 'NotFound':
      return new NotFoundException(error.message);
    default:
      return assertNever(error.kind);
  }
}

/** Returns the value or throws the matching HttpException. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw toHttpException(result.error);
  }
  return result.value;
}
