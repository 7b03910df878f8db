import { EventVisibility } from './event/model/event.model';
import { MembershipRole } from './membership/model/event-membership.model';
import { JoinRequestStatus } from './join-request/model/event-join-request.model';
import { createEngagementFixture, errorOf, expectOk } from './testing/engagement-fixture';

const HOST = 1;
const VERA = 2;
const WALT = 3;

describe('event engagement journey', () => {
    it('takes a guest from invitation to chat and favorites, then retires the event', async () => {
        const fixture = createEngagementFixture({ users: [HOST, VERA, WALT], locations: [1, 2] });
        const { events, invites, joinRequests, membership, directChat, chat, favorites } = fixture.services;

        // host creates an invite-only event and invites the same guest twice
        const created = expectOk(
            await events.createEvent(HOST, {
                title: 'Warehouse mural night',
                visibility: EventVisibility.PUBLIC_INVITE,
                startTime: '2999-04-01T19:00:00.000Z',
                startLocationId: 1,
                stopLocationIds: [2],
                inviteeIds: [VERA, VERA],
            }),
        );
        const eventId = created.event.id;
        expect(created.invites).toHaveLength(1);
        expect(fixture.models.membership.rows.filter((row) => row.userId === VERA)).toHaveLength(1);

        // an outstanding invite blocks a join request until it is declined
        expect(errorOf(await joinRequests.requestJoin(eventId, VERA))?.kind).toBe('AlreadyInvited');
        expectOk(await invites.decline(created.invites[0].id, VERA));
        const request = expectOk(await joinRequests.requestJoin(eventId, VERA));
        expect(request.status).toBe(JoinRequestStatus.PENDING);
        expect(fixture.models.joinRequest.rows).toHaveLength(1);

        expectOk(await joinRequests.approve(request.id, HOST));
        expect(await membership.userRoleInEvent(created.event, VERA)).toBe('ATTENDEE');
        expect(await membership.hasRole(eventId, VERA, [MembershipRole.ATTENDEE])).toBe(true);

        // uninvited users cannot walk in
        expect(errorOf(await membership.join(eventId, WALT))).toEqual({
            kind: 'InviteRequired',
            message: 'This event requires an invitation.',
        });

        // the host leaves the direct chat and comes back when the guest writes
        const conversation = expectOk(await directChat.getOrCreateChat(eventId, VERA, HOST));
        expectOk(await directChat.leave(conversation.id, HOST));
        expect(expectOk(await directChat.activeParticipants(conversation.id))).toEqual([VERA]);
        expectOk(await directChat.send(conversation.id, VERA, 'Meet at the loading dock?'));
        expect(expectOk(await directChat.activeParticipants(conversation.id))).toEqual([HOST, VERA]);
        expect(expectOk(await directChat.unreadCount(conversation.id, HOST))).toBe(1);

        expectOk(await chat.post(eventId, VERA, 'Bringing extra brushes'));
        expect(errorOf(await chat.post(eventId, WALT, 'Can I come?'))?.kind).toBe('NotAMember');

        expect(expectOk(await favorites.favorite(eventId, VERA)).created).toBe(true);
        expect(expectOk(await favorites.favorite(eventId, VERA)).created).toBe(false);
        expect((await favorites.listFavorites(VERA)).map((entry) => entry.event.id)).toEqual([eventId]);

        // soft delete hides the event everywhere
        expectOk(await events.deleteEvent(eventId, HOST));
        expect(await events.listPublicEvents()).toEqual([]);
        expect(await favorites.listFavorites(VERA)).toEqual([]);
        expect(errorOf(await favorites.favorite(eventId, WALT))?.kind).toBe('CannotFavoriteDeleted');
        expect(errorOf(await chat.post(eventId, VERA, 'Still on?'))?.kind).toBe('NotFound');
    });
});
