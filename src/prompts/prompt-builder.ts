/**
 * Prompt builders: render classifier prompts and facilitator instructions
 * from the session's participants and history.
 *
 * Templates use {{placeholder}} syntax. Unknown placeholders are left as-is,
 * and substituted values are never re-scanned, so message text containing
 * braces passes through untouched.
 */
import type { ChatMessage } from '@/history/types.js';
import type { Participant } from '@/participants/types.js';
import { SELECTION_TEMPLATE, TERMINATION_TEMPLATE } from './templates.js';

// ─── Helpers ───────────────────────────────────────────────────

/**
 * Replace {{placeholder}} tokens with provided values.
 * Unknown placeholders are left as-is.
 */
export function interpolate(template: string, variables: Record<string, string>): string {
  return template.replace(
    /\{\{(\w+)\}\}/g,
    (_match, key: string) => variables[key] ?? `{{${key}}}`,
  );
}

/** Render messages oldest-first as `author: content` lines. */
export function formatHistory(messages: readonly ChatMessage[]): string {
  if (messages.length === 0) return '(no messages)';
  return messages.map((m) => `${m.author}: ${m.content}`).join('\n');
}

/** One `- name: description` line per participant, as used by `{{aiAgents}}`. */
export function formatAgentRoster(
  participants: readonly Pick<Participant, 'name' | 'description'>[],
): string {
  return participants.map((p) => `- ${p.name}: ${p.description}`).join('\n\t\t');
}

// ─── Builders ──────────────────────────────────────────────────

/** Substitute the team roster into a facilitator's instructions. */
export function buildFacilitatorInstructions(
  instructions: string,
  participants: readonly Pick<Participant, 'name' | 'description'>[],
): string {
  return instructions.replaceAll('{{aiAgents}}', formatAgentRoster(participants));
}

export function buildSelectionPrompt(params: {
  participants: readonly Participant[];
  facilitator: string;
  history: readonly ChatMessage[];
}): string {
  return interpolate(SELECTION_TEMPLATE, {
    participants: params.participants.map((p) => `\t- ${p.name}`).join('\n'),
    facilitator: params.facilitator,
    history: formatHistory(params.history),
  });
}

/** The history passed here is the termination view: the last message only. */
export function buildTerminationPrompt(params: {
  participants: readonly Participant[];
  history: readonly ChatMessage[];
}): string {
  return interpolate(TERMINATION_TEMPLATE, {
    agentNames: params.participants.map((p) => p.name).join(','),
    history: formatHistory(params.history),
  });
}
