/**
 * WebSocket event names and room naming.
 * Centralized so the gateway and the fanout listener agree on them.
 */

export const SocketEvents = {
  // Client → Server
  CHAT_SUBSCRIBE: 'chat:subscribe',
  CHAT_UNSUBSCRIBE: 'chat:unsubscribe',

  // Server → Client
  CHAT_MESSAGE: 'chat:message',
  CHAT_NEW: 'chat:new',
  CHAT_MEMBERS: 'chat:members',
  CHAT_REMOVED: 'chat:removed',
  CHAT_UPDATED: 'chat:updated',
  CONTACT_UPDATED: 'contact:updated',

  AUTH_FAILED: 'auth_failed',
  EXCEPTION: 'exception',
} as const;

export type SocketEventName = (typeof SocketEvents)[keyof typeof SocketEvents];

export const SocketRooms = {
  user: (username: string) => `user:${username}`,
  chat: (chatId: string) => `chat:${chatId}`,
  chatMembers: (chatId: string) => `chat:${chatId}:members`,
  chatUpdates: (chatId: string) => `chat:${chatId}:updates`,
} as const;
