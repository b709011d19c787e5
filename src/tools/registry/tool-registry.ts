/**
 * ToolRegistry: the tools one agent may call.
 * Resolves tools by ID, validates input with Zod, and formats definitions
 * for the agent's LLM provider.
 */
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { z } from 'zod';

import { ToolNotFoundError, ValidationError } from '@/core/errors.js';
import type { HuddleError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';
import type { ToolDefinitionForProvider } from '@/providers/types.js';
import type { ExecutableTool, ToolContext, ToolResult } from '../types.js';

export interface ToolRegistryOptions {
  logger: Logger;
}

export interface ToolRegistry {
  /** Register a tool. Replaces existing registration for same ID. */
  register(tool: ExecutableTool): void;

  /** Get a tool by ID. Returns undefined if not found. */
  get(toolId: string): ExecutableTool | undefined;

  /** Check if a tool exists in the registry. */
  has(toolId: string): boolean;

  /** List all registered tool IDs. */
  listAll(): string[];

  /** Format every registered tool for an LLM provider. */
  formatForProvider(): ToolDefinitionForProvider[];

  /**
   * Resolve and execute a tool call.
   * Unknown tools and invalid input are returned as errors, not thrown.
   */
  resolve(
    toolId: string,
    input: Record<string, unknown>,
    context: ToolContext,
  ): Promise<Result<ToolResult, HuddleError>>;
}

/**
 * Create a new ToolRegistry instance.
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const { logger } = options;
  const tools = new Map<string, ExecutableTool>();

  function lookup(toolId: string, context: ToolContext): Result<ExecutableTool, HuddleError> {
    const tool = tools.get(toolId);
    if (!tool) {
      const available = [...tools.keys()];
      logger.warn('Tool hallucination detected', {
        component: 'tool-registry',
        toolId,
        availableTools: available,
        participant: context.participantName,
      });
      return err(new ToolNotFoundError(toolId, available));
    }
    return ok(tool);
  }

  function validateInput(
    tool: ExecutableTool,
    input: Record<string, unknown>,
  ): Result<unknown, HuddleError> {
    const parsed = tool.inputSchema.safeParse(input);
    if (!parsed.success) {
      logger.warn('Tool input validation failed', {
        component: 'tool-registry',
        toolId: tool.id,
        errors: parsed.error.issues,
      });
      return err(
        new ValidationError(`Invalid input for tool "${tool.id}"`, {
          toolId: tool.id,
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        }),
      );
    }
    return ok(parsed.data);
  }

  return {
    register(tool: ExecutableTool): void {
      logger.debug('Registering tool', {
        component: 'tool-registry',
        toolId: tool.id,
      });
      tools.set(tool.id, tool);
    },

    get(toolId: string): ExecutableTool | undefined {
      return tools.get(toolId);
    },

    has(toolId: string): boolean {
      return tools.has(toolId);
    },

    listAll(): string[] {
      return [...tools.keys()];
    },

    formatForProvider(): ToolDefinitionForProvider[] {
      return [...tools.values()].map((tool) => ({
        name: tool.id,
        description: tool.description,
        inputSchema: tool.parametersJsonSchema ?? toOpenAICompatibleSchema(tool.inputSchema),
      }));
    },

    async resolve(
      toolId: string,
      input: Record<string, unknown>,
      context: ToolContext,
    ): Promise<Result<ToolResult, HuddleError>> {
      const found = lookup(toolId, context);
      if (!found.ok) return found;
      const tool = found.value;

      const inputResult = validateInput(tool, input);
      if (!inputResult.ok) return inputResult;

      logger.info('Executing tool', {
        component: 'tool-registry',
        toolId: tool.id,
        participant: context.participantName,
        conversationId: context.conversationId,
      });

      return tool.execute(inputResult.value, context);
    },
  };
}

/**
 * Convert a Zod schema to an OpenAI-compatible JSON Schema.
 * OpenAI requires `type: "object"` at the top level for function parameters.
 *
 * Uses `jsonSchema7` target because OpenAI follows JSON Schema draft 7+ where
 * `exclusiveMinimum` is a number.
 */
export function toOpenAICompatibleSchema(zodSchema: z.ZodType): Record<string, unknown> {
  const raw = zodToJsonSchema(zodSchema, { target: 'jsonSchema7' }) as Record<string, unknown>;

  // OpenAI rejects $schema in function parameters
  delete raw['$schema'];

  if (raw['type'] !== 'object') {
    return { type: 'object', properties: {}, additionalProperties: false };
  }
  return raw;
}
