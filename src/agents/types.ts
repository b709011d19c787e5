/**
 * Agent adapter types.
 *
 * An adapter is the controller's uniform handle on one participant: it keeps
 * its own view of the conversation and produces exactly one reply per turn.
 */
import type { ParticipantConfig } from '@/config/types.js';
import type { RuntimeSettings } from '@/config/runtime.js';
import type { ConversationId } from '@/core/types.js';
import type { ChatMessage } from '@/history/types.js';
import type { Logger } from '@/observability/logger.js';
import type { Participant } from '@/participants/types.js';
import type { LLMProvider } from '@/providers/types.js';
import type { ToolRegistry } from '@/tools/registry/index.js';

// ─── Responses ───────────────────────────────────────────────────

/** One reply, attributed to the responding participant. */
export interface AgentResponse {
  author: string;
  content: string;
}

export interface RespondOptions {
  abortSignal?: AbortSignal;
}

// ─── Adapter ─────────────────────────────────────────────────────

export interface AgentAdapter {
  readonly participant: Participant;

  /**
   * Deliver a message that was appended to the shared history.
   * Messages already seen (by sequence index) are ignored.
   */
  receive(message: ChatMessage): void;

  /**
   * Produce this participant's next message from the given history.
   * Throws AgentExecutionError on model or tool failure; never retries.
   */
  respond(history: readonly ChatMessage[], options?: RespondOptions): Promise<AgentResponse>;
}

// ─── Special Agents ──────────────────────────────────────────────

/** Everything a custom adapter may need, resolved at session setup. */
export interface SpecialAgentContext {
  participant: Participant;
  config: ParticipantConfig;
  settings: RuntimeSettings;
  provider: LLMProvider;
  tools: ToolRegistry;
  conversationId: ConversationId;
  logger: Logger;
}

/** Builds adapters for participants of kind `special`. */
export type SpecialAgentFactory = (
  context: SpecialAgentContext,
) => AgentAdapter | Promise<AgentAdapter>;
