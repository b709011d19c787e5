export { createHistoryStore, persistedMessageSchema } from './history-store.js';
export type { PersistedMessage } from './history-store.js';
export type { AuthorRole, ChatMessage, HistoryStore, NewChatMessage } from './types.js';
