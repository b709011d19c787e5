/**
 * Selection policy: maps a selection verdict onto a participant.
 */
import type { Participant, ParticipantRegistry } from '@/participants/types.js';
import type { Verdict } from './types.js';

export interface SelectionResult {
  participant: Participant;
  /** True when the verdict named no participant and the facilitator was used. */
  fellBack: boolean;
}

/**
 * Resolve a verdict to a participant. Only an exact name match counts;
 * anything else (unknown, hallucinated, differently cased) resolves to the
 * facilitator. Pure: the same verdict always yields the same result.
 */
export function resolveSelection(
  verdict: Verdict,
  registry: Pick<ParticipantRegistry, 'get' | 'facilitator'>,
): SelectionResult {
  const match = registry.get(verdict.verdict);
  if (match) {
    return { participant: match, fellBack: false };
  }
  return { participant: registry.facilitator, fellBack: true };
}
