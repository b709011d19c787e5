/**
 * History Store: the session's append-only message log.
 * Sequence indices are assigned here and nowhere else.
 */
import { z } from 'zod';

import { ValidationError } from '@/core/errors.js';
import { HUMAN_AUTHOR } from '@/participants/types.js';
import type { ChatMessage, HistoryStore, NewChatMessage } from './types.js';

// ─── Persisted Records ──────────────────────────────────────────

/**
 * Shape accepted when resuming a session. `sequenceIndex`, if present, must
 * match the position.
 *
 * Without `role`, only the reserved human author `user` is read as `human`;
 * any other author becomes `agent`. Records of human turns stored under a
 * different name must carry `role: 'human'`, or the resumed history no
 * longer counts as all-human and the facilitator does not open the round.
 */
export const persistedMessageSchema = z.object({
  author: z.string().min(1, 'Message author cannot be empty'),
  content: z.string(),
  role: z.enum(['human', 'agent']).optional(),
  sequenceIndex: z.number().int().min(0).optional(),
});

export type PersistedMessage = z.infer<typeof persistedMessageSchema>;

function restore(records: readonly unknown[]): ChatMessage[] {
  const parsed = z.array(persistedMessageSchema).safeParse(records);
  if (!parsed.success) {
    throw new ValidationError('Invalid persisted history', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  return parsed.data.map((record, index) => {
    if (record.sequenceIndex !== undefined && record.sequenceIndex !== index) {
      throw new ValidationError('Persisted history is not contiguous', {
        position: index,
        sequenceIndex: record.sequenceIndex,
      });
    }
    return Object.freeze({
      author: record.author,
      role: record.role ?? (record.author === HUMAN_AUTHOR ? 'human' : 'agent'),
      content: record.content,
      sequenceIndex: index,
    });
  });
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Create a history store, optionally resuming from persisted records.
 *
 * @throws ValidationError when a record is malformed or out of sequence.
 */
export function createHistoryStore(records: readonly unknown[] = []): HistoryStore {
  const messages: ChatMessage[] = restore(records);

  return {
    append(message: NewChatMessage): ChatMessage {
      const stored: ChatMessage = Object.freeze({
        author: message.author,
        role: message.role,
        content: message.content,
        sequenceIndex: messages.length,
      });
      messages.push(stored);
      return stored;
    },

    all(): readonly ChatMessage[] {
      return [...messages];
    },

    last(): ChatMessage | undefined {
      return messages[messages.length - 1];
    },

    tail(n: number): ChatMessage[] {
      if (n <= 0) return [];
      return messages.slice(-n);
    },

    get size(): number {
      return messages.length;
    },
  };
}
