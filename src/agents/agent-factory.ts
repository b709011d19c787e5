/**
 * Builds one adapter per participant at session setup: tools first, then the
 * chat-completion agent or, for `special` participants, the injected factory.
 */
import type { RuntimeSettings } from '@/config/runtime.js';
import { ConfigurationError } from '@/core/errors.js';
import type { ConversationId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ParticipantRegistry } from '@/participants/types.js';
import { buildFacilitatorInstructions } from '@/prompts/prompt-builder.js';
import type { LLMProvider } from '@/providers/types.js';
import { buildAgentTools } from '@/tools/loader.js';
import type { FunctionToolCatalog, OpenApiToolLoader } from '@/tools/loader.js';
import { createChatCompletionAgent } from './chat-completion-agent.js';
import type { AgentAdapter, SpecialAgentFactory } from './types.js';

export interface AgentFactoryDeps {
  registry: ParticipantRegistry;
  settings: RuntimeSettings;
  provider: LLMProvider;
  conversationId: ConversationId;
  toolCatalog: FunctionToolCatalog;
  openApiLoader?: OpenApiToolLoader;
  specialAgentFactory?: SpecialAgentFactory;
  logger: Logger;
}

/**
 * Create adapters for every participant, keyed by name, in registry order.
 *
 * @throws ConfigurationError for tool misconfiguration or a special
 *   participant without a SpecialAgentFactory.
 */
export async function createAgentAdapters(
  deps: AgentFactoryDeps,
): Promise<Map<string, AgentAdapter>> {
  const { registry, settings, provider, conversationId, logger } = deps;
  const adapters = new Map<string, AgentAdapter>();

  for (const participant of registry.participants) {
    const config = registry.configFor(participant.name);
    if (!config) {
      throw new ConfigurationError(`No configuration for participant "${participant.name}"`);
    }
    const agentLogger = logger.child({ participant: participant.name });

    const tools = await buildAgentTools({
      participantName: participant.name,
      tools: config.tools ?? [],
      conversationId,
      catalog: deps.toolCatalog,
      openApiLoader: deps.openApiLoader,
      logger: agentLogger,
    });

    if (participant.isSpecialAgent) {
      if (!deps.specialAgentFactory) {
        throw new ConfigurationError(
          `Participant "${participant.name}" is a special agent but no factory was provided`,
          { participant: participant.name },
        );
      }
      adapters.set(
        participant.name,
        await deps.specialAgentFactory({
          participant,
          config,
          settings,
          provider,
          tools,
          conversationId,
          logger: agentLogger,
        }),
      );
      continue;
    }

    const instructions =
      participant.isFacilitator && config.instructions
        ? buildFacilitatorInstructions(config.instructions, registry.participants)
        : config.instructions;

    adapters.set(
      participant.name,
      createChatCompletionAgent({
        participant,
        instructions,
        temperature: config.temperature,
        provider,
        tools,
        settings,
        conversationId,
        logger: agentLogger,
      }),
    );
  }

  logger.debug('Agent adapters ready', {
    component: 'agent-factory',
    participants: [...adapters.keys()],
  });

  return adapters;
}
