import { DirectChatAttributes } from './model/direct-chat.model';

type ChatPair = Pick<DirectChatAttributes, 'user1Id' | 'user2Id'>;

/** Orders an unordered pair lower id first, matching how chats are stored. */
export function normalizePair(userAId: number, userBId: number): ChatPair {
  return userAId < userBId
    ? { user1Id: userAId, user2Id: userBId }
    : { user1Id: userBId, user2Id: userAId };
}

export function isParticipant(chat: ChatPair, userId: number): boolean {
  return chat.user1Id === userId || chat.user2Id === userId;
}

/** The participant who is not `userId`; null when `userId` is not in the chat. */
export function otherParticipant(chat: ChatPair, userId: number): number | null {
  if (chat.user1Id === userId) return chat.user2Id;
  if (chat.user2Id === userId) return chat.user1Id;
  return null;
}
