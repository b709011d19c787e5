/**
 * Agent adapters: the controller's handle on each participant.
 */

// ─── Types ───────────────────────────────────────────────────────

export type {
  AgentAdapter,
  AgentResponse,
  RespondOptions,
  SpecialAgentContext,
  SpecialAgentFactory,
} from './types.js';

// ─── Factory Functions ───────────────────────────────────────────

export { createChatCompletionAgent } from './chat-completion-agent.js';
export type { ChatCompletionAgentOptions } from './chat-completion-agent.js';
export { createAgentAdapters } from './agent-factory.js';
export type { AgentFactoryDeps } from './agent-factory.js';
