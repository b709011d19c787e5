// ─── Messages ────────────────────────────────────────────────────

/** Who produced a message: the human or one of the agents. */
export type AuthorRole = 'human' | 'agent';

/** One entry in the shared conversation history. Never mutated. */
export interface ChatMessage {
  readonly author: string;
  readonly role: AuthorRole;
  readonly content: string;
  /** Position in the history, contiguous from 0. */
  readonly sequenceIndex: number;
}

export type NewChatMessage = Omit<ChatMessage, 'sequenceIndex'>;

// ─── Store ───────────────────────────────────────────────────────

/** Append-only, ordered history shared by every component of a session. */
export interface HistoryStore {
  append(message: NewChatMessage): ChatMessage;
  /** Every message, oldest first. */
  all(): readonly ChatMessage[];
  last(): ChatMessage | undefined;
  /** The most recent `n` messages, oldest first. */
  tail(n: number): ChatMessage[];
  readonly size: number;
}
