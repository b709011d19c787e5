// ─── Types ──────────────────────────────────────────────────────
export type {
  HuddleConfig,
  OrchestrationConfig,
  ParticipantConfig,
  ParticipantKind,
  ToolConfig,
} from './types.js';
export type { HuddleConfigFile } from './loader.js';
export type { RuntimeSettings } from './runtime.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  huddleConfigFileSchema,
  llmProviderConfigSchema,
  openApiToolOptionsSchema,
  orchestrationConfigSchema,
  participantConfigSchema,
  toolConfigSchema,
} from './schema.js';
export type { OpenApiToolOptions } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { loadHuddleConfig, parseHuddleConfig, resolveEnvVars } from './loader.js';

// ─── Runtime ────────────────────────────────────────────────────
export {
  DEFAULT_AGENT_TEMPERATURE,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MAX_TOOL_ROUNDS,
  DEFAULT_SEED,
  resolveRuntimeSettings,
} from './runtime.js';
