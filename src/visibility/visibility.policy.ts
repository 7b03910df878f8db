import { assertNever } from '../common/errors/engagement-error';
import { Result, fail, ok } from '../common/result';
import { EventAttributes, EventVisibility } from '../event/model/event.model';
import { MembershipRole } from '../membership/model/event-membership.model';

export type PolicyEvent = Pick<EventAttributes, 'hostId' | 'visibility' | 'isDeleted'>;

/** What the policy needs to know about one user's standing on one event. */
export interface ViewerRelationship {
  userId: number;
  role: MembershipRole | null;
  hasPendingInvite: boolean;
  hasInvite: boolean;
}

export function canView(event: PolicyEvent, viewer: ViewerRelationship): boolean {
  if (event.isDeleted) {
    return false;
  }

  switch (event.visibility) {
    case EventVisibility.PUBLIC_OPEN:
    case EventVisibility.PUBLIC_INVITE:
      return true;
    case EventVisibility.PRIVATE:
      return event.hostId === viewer.userId || viewer.role !== null || viewer.hasInvite;
    default:
      return assertNever(event.visibility);
  }
}

export function canJoin(event: PolicyEvent, viewer: ViewerRelationship): Result<void> {
  if (event.isDeleted) {
    return fail('NotFound', 'Event not found.');
  }
  if (viewer.role === MembershipRole.HOST || viewer.role === MembershipRole.ATTENDEE) {
    return fail('AlreadyJoined', 'You have already joined this event.');
  }

  switch (event.visibility) {
    case EventVisibility.PUBLIC_OPEN:
      return ok(undefined);
    case EventVisibility.PUBLIC_INVITE:
      return viewer.hasPendingInvite
        ? ok(undefined)
        : fail('InviteRequired', 'This event requires an invitation.');
    case EventVisibility.PRIVATE:
      // membership on a private event only comes from accepting an invite
      return fail('PrivateEvent', 'This event is private.');
    default:
      return assertNever(event.visibility);
  }
}
