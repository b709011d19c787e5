// ─── Branded ID Types ────────────────────────────────────────────
// Branded types keep conversation ids apart from plain strings.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type ConversationId = Brand<string, 'ConversationId'>;

// ─── LLM Provider Config ────────────────────────────────────────

export type ProviderKind = 'openai' | 'azure-openai' | 'anthropic' | 'ollama';

export interface LLMProviderConfig {
  /** Backend identifier. */
  provider: ProviderKind;
  /** Model identifier, or the deployment name for Azure OpenAI. */
  model: string;
  maxOutputTokens?: number;
  /** References an env var name, never the raw key. */
  apiKeyEnvVar?: string;
  /** Custom base URL (Ollama, proxies) or the Azure resource endpoint. */
  baseUrl?: string;
  /** Azure OpenAI API version. */
  apiVersion?: string;
}
