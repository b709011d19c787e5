/**
 * Tool loader: turns a participant's tool configuration into a populated
 * ToolRegistry at session setup. Every configuration problem surfaces here,
 * before the conversation loop starts.
 */
import type { ToolConfig } from '@/config/types.js';
import { openApiToolOptionsSchema } from '@/config/schema.js';
import type { OpenApiToolOptions } from '@/config/schema.js';
import { ConfigurationError } from '@/core/errors.js';
import type { ConversationId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createToolRegistry } from './registry/tool-registry.js';
import type { ToolRegistry } from './registry/tool-registry.js';
import type { ExecutableTool } from './types.js';

// ─── Plugin Contracts ───────────────────────────────────────────

/** Handed to tool factories and loaders. */
export interface ToolPluginContext {
  participantName: string;
  conversationId: ConversationId;
  logger: Logger;
}

/** Builds the tool(s) registered under one catalog name. */
export type FunctionToolFactory = (
  context: ToolPluginContext,
) => ExecutableTool | ExecutableTool[];

/** Named function tools a configuration may reference. */
export type FunctionToolCatalog = Readonly<Record<string, FunctionToolFactory>>;

/** Extra headers sent with every request an OpenAPI tool makes. */
export type HeaderProvider = () => Record<string, string>;

export interface OpenApiToolSource {
  /** Configured tool name, used as the ID prefix. */
  name: string;
  options: OpenApiToolOptions;
  headers: HeaderProvider;
  context: ToolPluginContext;
}

export interface OpenApiToolLoader {
  load(source: OpenApiToolSource): Promise<ExecutableTool[]>;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Headers identifying the conversation to downstream APIs. */
export function createConversationHeaders(conversationId: ConversationId): HeaderProvider {
  return () => ({ 'conversation-id': conversationId });
}

// ─── Loader ─────────────────────────────────────────────────────

export interface BuildAgentToolsParams {
  participantName: string;
  tools: readonly ToolConfig[];
  conversationId: ConversationId;
  catalog: FunctionToolCatalog;
  openApiLoader?: OpenApiToolLoader;
  logger: Logger;
}

/**
 * Build the tool registry for one participant.
 *
 * @throws ConfigurationError for an unknown tool type, an unknown function
 *   tool, invalid openapi options, or an openapi tool without a loader.
 */
export async function buildAgentTools(params: BuildAgentToolsParams): Promise<ToolRegistry> {
  const { participantName, conversationId, catalog, openApiLoader, logger } = params;
  const registry = createToolRegistry({ logger });
  const context: ToolPluginContext = { participantName, conversationId, logger };

  for (const tool of params.tools) {
    const type = tool.type ?? 'function';

    switch (type) {
      case 'function': {
        const factory = catalog[tool.name];
        if (!factory) {
          throw new ConfigurationError(`Unknown function tool: ${tool.name}`, {
            participant: participantName,
            tool: tool.name,
            available: Object.keys(catalog),
          });
        }
        const built = factory(context);
        for (const executable of Array.isArray(built) ? built : [built]) {
          registry.register(executable);
        }
        break;
      }

      case 'openapi': {
        const parsed = openApiToolOptionsSchema.safeParse(tool);
        if (!parsed.success) {
          throw new ConfigurationError(`Invalid openapi tool "${tool.name}"`, {
            participant: participantName,
            issues: parsed.error.issues.map((issue) => ({
              path: issue.path.join('.'),
              message: issue.message,
            })),
          });
        }
        if (!openApiLoader) {
          throw new ConfigurationError(`No OpenAPI loader available for tool "${tool.name}"`, {
            participant: participantName,
          });
        }
        const loaded = await openApiLoader.load({
          name: tool.name,
          options: parsed.data,
          headers: createConversationHeaders(conversationId),
          context,
        });
        for (const executable of loaded) {
          registry.register(executable);
        }
        break;
      }

      default:
        throw new ConfigurationError(`Unknown tool type: ${type}`, {
          participant: participantName,
          tool: tool.name,
        });
    }
  }

  logger.debug('Agent tools ready', {
    component: 'tool-loader',
    participant: participantName,
    tools: registry.listAll(),
  });

  return registry;
}
