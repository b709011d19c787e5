import type { LLMProviderConfig } from '@/core/types.js';

// ─── Participant Configuration ──────────────────────────────────

/**
 * How a configured agent takes part in the conversation.
 * - `chat`: a model-backed agent with its own tool loop
 * - `special`: built by a host-supplied factory
 * - `background`: runs alongside the chat but never takes a turn
 */
export type ParticipantKind = 'chat' | 'special' | 'background';

/** One tool entry on a participant. Extra fields depend on `type`. */
export interface ToolConfig {
  name: string;
  /** `function` (default) or `openapi`. */
  type?: string;
  [key: string]: unknown;
}

/** One agent as written in the configuration. */
export interface ParticipantConfig {
  name: string;
  description: string;
  /** System instructions. A facilitator may use the `{{aiAgents}}` placeholder. */
  instructions?: string;
  facilitator?: boolean;
  kind?: ParticipantKind;
  temperature?: number;
  tools?: ToolConfig[];
}

// ─── Orchestration Configuration ────────────────────────────────

export interface OrchestrationConfig {
  /** Automated turns allowed per human round before the loop halts. */
  maxIterations?: number;
  /** Seed passed to every classifier and agent call. */
  seed?: number;
  /** Agent temperature when a participant sets none. */
  defaultAgentTemperature?: number;
  /** Model → tool → model cycles allowed inside one agent turn. */
  maxToolRounds?: number;
  /** Overrides model-name detection of sampling temperature support. */
  supportsTemperature?: boolean;
}

// ─── Config File ────────────────────────────────────────────────

/** A complete configuration file. */
export interface HuddleConfig {
  model: LLMProviderConfig;
  orchestration?: OrchestrationConfig;
  participants: ParticipantConfig[];
}
