import type { ParticipantConfig } from '@/config/types.js';

// ─── Participant ─────────────────────────────────────────────────

/** Author name reserved for the human in the shared history. */
export const HUMAN_AUTHOR = 'user';

/** One agent taking part in turn-taking. Immutable for the session. */
export interface Participant {
  readonly name: string;
  readonly description: string;
  readonly isFacilitator: boolean;
  readonly isSpecialAgent: boolean;
}

// ─── Registry ────────────────────────────────────────────────────

export interface ParticipantRegistry {
  /** Participants in configuration order. */
  readonly participants: readonly Participant[];
  readonly facilitator: Participant;
  get(name: string): Participant | undefined;
  has(name: string): boolean;
  names(): string[];
  /** The configuration record a participant was built from. */
  configFor(name: string): ParticipantConfig | undefined;
}
