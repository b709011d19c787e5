import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@/core/errors.js';
import { TEST_CONVERSATION_ID } from '@/testing/fixtures/context.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createEchoTool, createFailingTool } from '@/testing/fixtures/tools.js';
import { buildAgentTools, createConversationHeaders } from './loader.js';
import type { OpenApiToolLoader } from './loader.js';

const catalog = {
  echo: () => createEchoTool(),
  pair: () => [createEchoTool(), createFailingTool()],
};

describe('createConversationHeaders', () => {
  it('sends the conversation id', () => {
    expect(createConversationHeaders(TEST_CONVERSATION_ID)()).toEqual({
      'conversation-id': 'test-conversation',
    });
  });
});

describe('buildAgentTools', () => {
  it('registers function tools from the catalog, defaulting the type', async () => {
    const registry = await buildAgentTools({
      participantName: 'Radiology',
      tools: [{ name: 'echo' }],
      conversationId: TEST_CONVERSATION_ID,
      catalog,
      logger: createMockLogger(),
    });

    expect(registry.listAll()).toEqual(['echo']);
  });

  it('registers every tool a factory returns', async () => {
    const registry = await buildAgentTools({
      participantName: 'Radiology',
      tools: [{ name: 'pair', type: 'function' }],
      conversationId: TEST_CONVERSATION_ID,
      catalog,
      logger: createMockLogger(),
    });

    expect(registry.listAll()).toEqual(['echo', 'broken']);
  });

  it('passes the plugin context to factories', async () => {
    const factory = vi.fn(() => createEchoTool());
    const logger = createMockLogger();

    await buildAgentTools({
      participantName: 'Radiology',
      tools: [{ name: 'spy' }],
      conversationId: TEST_CONVERSATION_ID,
      catalog: { spy: factory },
      logger,
    });

    expect(factory).toHaveBeenCalledWith({
      participantName: 'Radiology',
      conversationId: TEST_CONVERSATION_ID,
      logger,
    });
  });

  it('rejects an unknown function tool', async () => {
    await expect(
      buildAgentTools({
        participantName: 'Radiology',
        tools: [{ name: 'teleport' }],
        conversationId: TEST_CONVERSATION_ID,
        catalog,
        logger: createMockLogger(),
      }),
    ).rejects.toThrow('Unknown function tool: teleport');
  });

  it('rejects an unknown tool type', async () => {
    const error = await buildAgentTools({
      participantName: 'Radiology',
      tools: [{ name: 'stub', type: 'grpc' }],
      conversationId: TEST_CONVERSATION_ID,
      catalog,
      logger: createMockLogger(),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'Unknown tool type: grpc' });
  });

  describe('openapi tools', () => {
    it('delegates to the loader with parsed options and conversation headers', async () => {
      const load = vi.fn<OpenApiToolLoader['load']>(() => Promise.resolve([createEchoTool()]));

      const registry = await buildAgentTools({
        participantName: 'Radiology',
        tools: [{ name: 'records', type: 'openapi', openapiDocumentPath: './records.json' }],
        conversationId: TEST_CONVERSATION_ID,
        catalog,
        openApiLoader: { load },
        logger: createMockLogger(),
      });

      expect(registry.listAll()).toEqual(['echo']);
      const source = load.mock.calls[0]?.[0];
      expect(source?.name).toBe('records');
      expect(source?.options).toEqual({
        openapiDocumentPath: './records.json',
        timeoutMs: 600_000,
        debugLogging: false,
      });
      expect(source?.headers()).toEqual({ 'conversation-id': 'test-conversation' });
    });

    it('rejects openapi tools missing a document path', async () => {
      await expect(
        buildAgentTools({
          participantName: 'Radiology',
          tools: [{ name: 'records', type: 'openapi' }],
          conversationId: TEST_CONVERSATION_ID,
          catalog,
          openApiLoader: { load: () => Promise.resolve([]) },
          logger: createMockLogger(),
        }),
      ).rejects.toThrow('Invalid openapi tool "records"');
    });

    it('rejects openapi tools when no loader is available', async () => {
      await expect(
        buildAgentTools({
          participantName: 'Radiology',
          tools: [{ name: 'records', type: 'openapi', openapiDocumentPath: './records.json' }],
          conversationId: TEST_CONVERSATION_ID,
          catalog,
          logger: createMockLogger(),
        }),
      ).rejects.toThrow('No OpenAPI loader available for tool "records"');
    });
  });
});
