import {
    BadRequestException,
    ConflictException,
    ForbiddenException,
    NotFoundException,
} from '@nestjs/common';
import { fail, ok } from '../result';
import { EngagementErrorKind, toHttpException, unwrap } from './engagement-error';

describe('toHttpException', () => {
    const cases: Array<[EngagementErrorKind, new (message: string) => Error, number]> = [
        ['ValidationError', BadRequestException, 400],
        ['InvalidMessage', BadRequestException, 400],
        ['AlreadyJoined', ConflictException, 409],
        ['AlreadyInvited', ConflictException, 409],
        ['AlreadyMember', ConflictException, 409],
        ['AlreadyLeft', ConflictException, 409],
        ['AlreadyReported', ConflictException, 409],
        ['PrivateEvent', ForbiddenException, 403],
        ['InviteRequired', ForbiddenException, 403],
        ['Forbidden', ForbiddenException, 403],
        ['NotAMember', ForbiddenException, 403],
        ['NotRegistered', ForbiddenException, 403],
        ['HostCannotLeave', ForbiddenException, 403],
        ['CannotFavoriteDeleted', ForbiddenException, 403],
        ['NotFound', NotFoundException, 404],
    ];

    it.each(cases)('maps %s to %p', (kind, exceptionType, status) => {
        const exception = toHttpException({ kind, message: 'some message' });

        expect(exception).toBeInstanceOf(exceptionType);
        expect(exception.getStatus()).toBe(status);
        expect(exception.message).toBe('some message');
    });
});

describe('unwrap', () => {
    it('returns the value of a successful result', () => {
        expect(unwrap(ok(42))).toBe(42);
    });

    it('throws the mapped exception for a failure', () => {
        expect(() => unwrap(fail('HostCannotLeave', 'The host cannot leave their own event.'))).toThrow(
            new ForbiddenException('The host cannot leave their own event.'),
        );
    });
});
