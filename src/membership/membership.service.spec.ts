import { EventVisibility } from '../event/model/event.model';
import { InviteStatus } from '../invite/model/event-invite.model';
import { EngagementFixture, createEngagementFixture, errorOf, expectOk } from '../testing/engagement-fixture';
import { MembershipRole } from './model/event-membership.model';

const HOST = 10;
const USER = 20;
const OTHER = 30;

describe('MembershipService', () => {
    let fixture: EngagementFixture;

    const rolesOf = (eventId: number) =>
        fixture.models.membership.rows
            .filter((row) => row.eventId === eventId)
            .map((row) => [row.userId, row.role]);

    beforeEach(() => {
        fixture = createEngagementFixture({ users: [HOST, USER, OTHER] });
    });

    // ─── grant / revoke ───────────────────────────────────────────────────────

    describe('grant', () => {
        it('inserts a row and then updates its role in place', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            const service = fixture.services.membership;

            await service.grant(eventId, USER, MembershipRole.INVITED);
            await service.grant(eventId, USER, MembershipRole.ATTENDEE);

            expect(rolesOf(eventId)).toEqual([
                [HOST, MembershipRole.HOST],
                [USER, MembershipRole.ATTENDEE],
            ]);
        });
    });

    describe('revoke', () => {
        it('only deletes a row that still holds the expected role', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            fixture.seedMember(eventId, USER, MembershipRole.ATTENDEE);

            const wrongRole = await fixture.services.membership.revoke(eventId, USER, MembershipRole.INVITED);

            expect(errorOf(wrongRole)?.kind).toBe('NotAMember');
            expect(rolesOf(eventId)).toContainEqual([USER, MembershipRole.ATTENDEE]);

            expectOk(await fixture.services.membership.revoke(eventId, USER, MembershipRole.ATTENDEE));
            expect(rolesOf(eventId)).toEqual([[HOST, MembershipRole.HOST]]);
        });
    });

    // ─── join ─────────────────────────────────────────────────────────────────

    describe('join', () => {
        it('adds an ATTENDEE to an open event and rejects a second join', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });

            const membership = expectOk(await fixture.services.membership.join(eventId, USER));
            const again = await fixture.services.membership.join(eventId, USER);

            expect(membership.role).toBe(MembershipRole.ATTENDEE);
            expect(await fixture.services.membership.hasRole(eventId, USER, [MembershipRole.ATTENDEE])).toBe(true);
            expect(again).toEqual({
                ok: false,
                error: { kind: 'AlreadyJoined', message: 'You have already joined this event.' },
            });
        });

        it('reports missing and deleted events as not found', async () => {
            const deletedId = fixture.seedEvent({ hostId: HOST, isDeleted: true });

            expect(errorOf(await fixture.services.membership.join(999, USER))?.kind).toBe('NotFound');
            expect(errorOf(await fixture.services.membership.join(deletedId, USER))?.kind).toBe('NotFound');
        });

        it('refuses direct joins on private events', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST, visibility: EventVisibility.PRIVATE });

            const result = await fixture.services.membership.join(eventId, USER);

            expect(errorOf(result)).toEqual({ kind: 'PrivateEvent', message: 'This event is private.' });
            expect(rolesOf(eventId)).toEqual([[HOST, MembershipRole.HOST]]);
        });

        it('requires a pending invite on invite-only events and promotes the INVITED row', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST, visibility: EventVisibility.PUBLIC_INVITE });

            expect(errorOf(await fixture.services.membership.join(eventId, USER))?.kind).toBe('InviteRequired');

            fixture.models.invite.seed({
                eventId,
                inviteeId: USER,
                invitedById: HOST,
                status: InviteStatus.PENDING,
            });
            fixture.seedMember(eventId, USER, MembershipRole.INVITED);

            expectOk(await fixture.services.membership.join(eventId, USER));
            expect(rolesOf(eventId)).toEqual([
                [HOST, MembershipRole.HOST],
                [USER, MembershipRole.ATTENDEE],
            ]);
        });

        it('lets exactly one of two concurrent joins through', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });

            const results = await Promise.all([
                fixture.services.membership.join(eventId, USER),
                fixture.services.membership.join(eventId, USER),
            ]);

            expect(results.filter((result) => result.ok)).toHaveLength(1);
            expect(results.map((result) => errorOf(result)?.kind).filter(Boolean)).toEqual(['AlreadyJoined']);
            expect(rolesOf(eventId)).toEqual([
                [HOST, MembershipRole.HOST],
                [USER, MembershipRole.ATTENDEE],
            ]);
        });
    });

    // ─── leave ────────────────────────────────────────────────────────────────

    describe('leave', () => {
        it('does not let the host leave', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });

            expect(errorOf(await fixture.services.membership.leave(eventId, HOST))).toEqual({
                kind: 'HostCannotLeave',
                message: 'The host cannot leave their own event.',
            });
        });

        it('removes an attendee', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            fixture.seedMember(eventId, USER);

            expectOk(await fixture.services.membership.leave(eventId, USER));
            expect(await fixture.services.membership.userHasJoined(eventId, USER)).toBe(false);
            expect(fixture.sequelize.transaction).toHaveBeenCalledTimes(1);
            expect(fixture.models.membership.destroy).toHaveBeenCalledWith({
                where: { eventId, userId: USER, role: MembershipRole.ATTENDEE },
                transaction: expect.objectContaining({ id: expect.any(Number) }),
            });
        });

        it('reports users without an ATTENDEE row as not registered', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            fixture.seedMember(eventId, USER, MembershipRole.INVITED);

            expect(errorOf(await fixture.services.membership.leave(eventId, USER))).toEqual({
                kind: 'NotRegistered',
                message: 'You are not registered for this event.',
            });
            expect(errorOf(await fixture.services.membership.leave(eventId, OTHER))?.kind).toBe('NotRegistered');
            expect(rolesOf(eventId)).toContainEqual([USER, MembershipRole.INVITED]);
        });
    });

    // ─── queries ──────────────────────────────────────────────────────────────

    describe('userRoleInEvent', () => {
        it('classifies host, attendee and visitor', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            fixture.seedMember(eventId, USER);
            fixture.seedMember(eventId, OTHER, MembershipRole.INVITED);
            const event = { id: eventId, hostId: HOST };

            expect(await fixture.services.membership.userRoleInEvent(event, HOST)).toBe('HOST');
            expect(await fixture.services.membership.userRoleInEvent(event, USER)).toBe('ATTENDEE');
            expect(await fixture.services.membership.userRoleInEvent(event, OTHER)).toBe('VISITOR');
        });
    });

    describe('listAttendees', () => {
        it('lists host and attendees in join order, leaving out invitees', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            fixture.seedMember(eventId, OTHER);
            fixture.seedMember(eventId, 40, MembershipRole.INVITED);
            fixture.seedMember(eventId, USER);

            const attendees = expectOk(await fixture.services.membership.listAttendees(eventId));

            expect(attendees.map((membership) => membership.userId)).toEqual([HOST, OTHER, USER]);
        });

        it('reports a missing event', async () => {
            expect(errorOf(await fixture.services.membership.listAttendees(404))?.kind).toBe('NotFound');
        });
    });

    describe('getRelationship', () => {
        it('reports role and invite state', async () => {
            const eventId = fixture.seedEvent({ hostId: HOST });
            fixture.models.invite.seed({
                eventId,
                inviteeId: USER,
                invitedById: HOST,
                status: InviteStatus.DECLINED,
            });

            expect(await fixture.services.membership.getRelationship({ id: eventId }, USER)).toEqual({
                userId: USER,
                role: null,
                hasInvite: true,
                hasPendingInvite: false,
            });
        });
    });
});
