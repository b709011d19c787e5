/**
 * Runtime settings: the explicit, resolved-once view of configuration
 * that every session component receives. Nothing downstream reads
 * process-wide state.
 */
import type { LLMProviderConfig } from '@/core/types.js';
import { modelSupportsTemperature } from '@/providers/models.js';

import type { OrchestrationConfig } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 30;
export const DEFAULT_SEED = 42;
export const DEFAULT_AGENT_TEMPERATURE = 0;
export const DEFAULT_MAX_TOOL_ROUNDS = 10;
export const DEFAULT_MAX_OUTPUT_TOKENS = 4096;

export interface RuntimeSettings {
  /** Backend used by agents and classifiers alike. */
  readonly model: LLMProviderConfig;
  /** Whether `temperature` may be sent to the backend model. */
  readonly supportsTemperature: boolean;
  readonly seed: number;
  readonly defaultAgentTemperature: number;
  readonly maxIterations: number;
  readonly maxToolRounds: number;
  readonly maxOutputTokens: number;
}

/** Resolve settings once at startup. */
export function resolveRuntimeSettings(config: {
  model: LLMProviderConfig;
  orchestration?: OrchestrationConfig;
}): RuntimeSettings {
  const orchestration = config.orchestration ?? {};
  return Object.freeze({
    model: config.model,
    supportsTemperature:
      orchestration.supportsTemperature ?? modelSupportsTemperature(config.model.model),
    seed: orchestration.seed ?? DEFAULT_SEED,
    defaultAgentTemperature: orchestration.defaultAgentTemperature ?? DEFAULT_AGENT_TEMPERATURE,
    maxIterations: orchestration.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    maxToolRounds: orchestration.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS,
    maxOutputTokens: config.model.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
  });
}
