import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { ExecutableTool } from '../types.js';
import { createToolRegistry, toOpenAICompatibleSchema } from './tool-registry.js';
import { createTestToolContext } from '@/testing/fixtures/context.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createEchoTool, createFailingTool } from '@/testing/fixtures/tools.js';

function createRegistry(): ReturnType<typeof createToolRegistry> {
  return createToolRegistry({ logger: createMockLogger() });
}

describe('ToolRegistry', () => {
  describe('register', () => {
    it('registers a tool and makes it retrievable', () => {
      const registry = createRegistry();
      const echo = createEchoTool();
      registry.register(echo);

      expect(registry.has('echo')).toBe(true);
      expect(registry.get('echo')).toBe(echo);
    });

    it('lists all registered tool IDs', () => {
      const registry = createRegistry();
      registry.register(createEchoTool());
      registry.register(createFailingTool());

      expect(registry.listAll()).toEqual(['echo', 'broken']);
    });

    it('replaces a tool registered under the same ID', () => {
      const registry = createRegistry();
      const first = createEchoTool();
      const second = createEchoTool();
      registry.register(first);
      registry.register(second);

      expect(registry.get('echo')).toBe(second);
      expect(registry.listAll()).toEqual(['echo']);
    });

    it('returns undefined for unregistered tools', () => {
      expect(createRegistry().get('nope')).toBeUndefined();
    });
  });

  describe('resolve', () => {
    it('executes a registered tool with validated input', async () => {
      const registry = createRegistry();
      registry.register(createEchoTool());

      const result = await registry.resolve(
        'echo',
        { message: 'hi' },
        createTestToolContext({ participantName: 'Radiology' }),
      );

      expect(result).toEqual({
        ok: true,
        value: { success: true, output: { echo: 'hi', caller: 'Radiology' }, durationMs: 1 },
      });
    });

    it('returns TOOL_NOT_FOUND for hallucinated tools', async () => {
      const registry = createRegistry();
      registry.register(createEchoTool());

      const result = await registry.resolve('ghost-tool', {}, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TOOL_NOT_FOUND');
        expect(result.error.context).toEqual({ toolId: 'ghost-tool', availableTools: ['echo'] });
      }
    });

    it('returns VALIDATION_ERROR for input that fails the schema', async () => {
      const registry = createRegistry();
      registry.register(createEchoTool());

      const result = await registry.resolve('echo', { message: 42 }, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('VALIDATION_ERROR');
        expect(result.error.message).toBe('Invalid input for tool "echo"');
      }
    });

    it('passes execution failures through', async () => {
      const registry = createRegistry();
      registry.register(createFailingTool());

      const result = await registry.resolve('broken', {}, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TOOL_EXECUTION_ERROR');
      }
    });
  });

  describe('formatForProvider', () => {
    it('converts zod input schemas to JSON schema', () => {
      const registry = createRegistry();
      registry.register(createEchoTool());

      expect(registry.formatForProvider()).toEqual([
        {
          name: 'echo',
          description: 'Echoes the input message back.',
          inputSchema: {
            type: 'object',
            properties: { message: { type: 'string' } },
            required: ['message'],
            additionalProperties: false,
          },
        },
      ]);
    });

    it('uses a provided JSON schema as-is', () => {
      const registry = createRegistry();
      const parameters = { type: 'object', properties: { id: { type: 'integer' } } };
      const tool: ExecutableTool = {
        ...createEchoTool(),
        id: 'records-getRecord',
        parametersJsonSchema: parameters,
      };
      registry.register(tool);

      expect(registry.formatForProvider()[0]?.inputSchema).toBe(parameters);
    });
  });
});

describe('toOpenAICompatibleSchema', () => {
  it('strips $schema', () => {
    const schema = toOpenAICompatibleSchema(z.object({ a: z.number() }));
    expect(schema['$schema']).toBeUndefined();
    expect(schema['type']).toBe('object');
  });

  it('wraps non-object schemas in an empty object schema', () => {
    expect(toOpenAICompatibleSchema(z.string())).toEqual({
      type: 'object',
      properties: {},
      additionalProperties: false,
    });
  });
});
