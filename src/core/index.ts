// Core module: shared types, errors, and the Result type
export type {
  ConversationId,
  LLMProviderConfig,
  ProviderKind,
} from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap } from './result.js';

export {
  HuddleError,
  ConfigurationError,
  ValidationError,
  ProviderError,
  ClassifierParseError,
  TerminationContractViolation,
  AgentExecutionError,
  ToolNotFoundError,
  ToolExecutionError,
  SessionError,
  SessionAbortedError,
} from './errors.js';
