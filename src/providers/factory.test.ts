import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { LLMProviderConfig } from '@/core/types.js';
import { ProviderError } from '@/core/errors.js';

// Mock the provider constructors to avoid real SDK initialization
vi.mock('./anthropic.js', () => ({
  createAnthropicProvider: vi.fn(() => ({
    id: 'anthropic:claude-sonnet-4-5-20250929',
    displayName: 'Anthropic claude-sonnet-4-5-20250929',
  })),
}));

vi.mock('./openai.js', () => ({
  createOpenAIProvider: vi.fn(() => ({
    id: 'openai:gpt-4o',
    displayName: 'OpenAI gpt-4o',
  })),
}));

// Import after mocks are set up
const { createProvider } = await import('./factory.js');
const { createAnthropicProvider } = await import('./anthropic.js');
const { createOpenAIProvider } = await import('./openai.js');

describe('createProvider', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    vi.clearAllMocks();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('creates an Anthropic provider when configured', () => {
    process.env['ANTHROPIC_API_KEY'] = 'test-key';

    const config: LLMProviderConfig = {
      provider: 'anthropic',
      model: 'claude-sonnet-4-5-20250929',
      apiKeyEnvVar: 'ANTHROPIC_API_KEY',
    };

    createProvider(config);

    expect(createAnthropicProvider).toHaveBeenCalledWith({
      apiKey: 'test-key',
      model: 'claude-sonnet-4-5-20250929',
      baseUrl: undefined,
    });
  });

  it('creates an OpenAI provider when configured', () => {
    process.env['OPENAI_API_KEY'] = 'test-key';

    const config: LLMProviderConfig = {
      provider: 'openai',
      model: 'gpt-4o',
      apiKeyEnvVar: 'OPENAI_API_KEY',
    };

    createProvider(config);

    expect(createOpenAIProvider).toHaveBeenCalledWith({
      apiKey: 'test-key',
      model: 'gpt-4o',
      baseUrl: undefined,
      providerLabel: 'openai',
    });
  });

  it('creates an Azure OpenAI provider with the configured api version', () => {
    process.env['AZURE_OPENAI_API_KEY'] = 'test-key';

    const config: LLMProviderConfig = {
      provider: 'azure-openai',
      model: 'gpt-4o-deployment',
      apiKeyEnvVar: 'AZURE_OPENAI_API_KEY',
      baseUrl: 'https://example-resource.openai.azure.com',
      apiVersion: '2024-10-21',
    };

    createProvider(config);

    expect(createOpenAIProvider).toHaveBeenCalledWith({
      apiKey: 'test-key',
      model: 'gpt-4o-deployment',
      baseUrl: 'https://example-resource.openai.azure.com',
      providerLabel: 'azure-openai',
      azure: { apiVersion: '2024-10-21' },
    });
  });

  it('falls back to the default Azure api version', () => {
    process.env['AZURE_OPENAI_API_KEY'] = 'test-key';

    createProvider({
      provider: 'azure-openai',
      model: 'gpt-4o-deployment',
      apiKeyEnvVar: 'AZURE_OPENAI_API_KEY',
      baseUrl: 'https://example-resource.openai.azure.com',
    });

    expect(createOpenAIProvider).toHaveBeenCalledWith(
      expect.objectContaining({ azure: { apiVersion: '2025-04-01-preview' } }),
    );
  });

  it('requires an endpoint for Azure OpenAI', () => {
    process.env['AZURE_OPENAI_API_KEY'] = 'test-key';

    expect(() =>
      createProvider({
        provider: 'azure-openai',
        model: 'gpt-4o-deployment',
        apiKeyEnvVar: 'AZURE_OPENAI_API_KEY',
      }),
    ).toThrow(ProviderError);
  });

  it('creates an Ollama provider without requiring an API key', () => {
    const config: LLMProviderConfig = {
      provider: 'ollama',
      model: 'llama3',
    };

    createProvider(config);

    expect(createOpenAIProvider).toHaveBeenCalledWith({
      apiKey: 'ollama',
      model: 'llama3',
      baseUrl: 'http://localhost:11434/v1',
      providerLabel: 'ollama',
    });
  });

  it('uses custom baseUrl for Ollama when provided', () => {
    const config: LLMProviderConfig = {
      provider: 'ollama',
      model: 'llama3',
      baseUrl: 'http://my-server:11434/v1',
    };

    createProvider(config);

    expect(createOpenAIProvider).toHaveBeenCalledWith({
      apiKey: 'ollama',
      model: 'llama3',
      baseUrl: 'http://my-server:11434/v1',
      providerLabel: 'ollama',
    });
  });

  it('throws ProviderError when apiKeyEnvVar is not configured', () => {
    const config: LLMProviderConfig = {
      provider: 'anthropic',
      model: 'claude-sonnet-4-5-20250929',
    };

    expect(() => createProvider(config)).toThrow(ProviderError);
  });

  it('throws ProviderError when env var is not set', () => {
    delete process.env['MISSING_KEY'];

    const config: LLMProviderConfig = {
      provider: 'openai',
      model: 'gpt-4o',
      apiKeyEnvVar: 'MISSING_KEY',
    };

    expect(() => createProvider(config)).toThrow(ProviderError);
    expect(() => createProvider(config)).toThrow('not set or empty');
  });
});
