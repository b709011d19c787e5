// LLM provider adapters (openai, azure-openai, anthropic, ollama)
export type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  MessageContent,
  MessageRole,
  ResponseFormat,
  StopReason,
  TextContent,
  TokenUsage,
  ToolDefinitionForProvider,
  ToolResultContent,
  ToolUseContent,
} from './types.js';

export { createProvider } from './factory.js';
export type { ProviderFactory } from './factory.js';
export { createAnthropicProvider } from './anthropic.js';
export type { AnthropicProviderOptions } from './anthropic.js';
export { createOpenAIProvider } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
export { modelSupportsTemperature, modelSupportsTools } from './models.js';
export { collectCompletion } from './stream.js';
export type { CollectedCompletion, ToolUse } from './stream.js';
