/**
 * Chat-completion agent: a participant backed by one LLM plus its own tools.
 *
 * The agent keeps a private thread of every message published to it. On each
 * turn it replays that thread to the model and runs its own tool loop
 * (LLM call → tool calls → results → LLM call) until the model answers
 * without requesting tools.
 */
import type { RuntimeSettings } from '@/config/runtime.js';
import { AgentExecutionError, HuddleError } from '@/core/errors.js';
import type { ConversationId } from '@/core/types.js';
import type { ChatMessage } from '@/history/types.js';
import type { Logger } from '@/observability/logger.js';
import type { Participant } from '@/participants/types.js';
import { collectCompletion } from '@/providers/stream.js';
import type { ToolUse } from '@/providers/stream.js';
import type { LLMProvider, Message, MessageContent } from '@/providers/types.js';
import type { ToolRegistry } from '@/tools/registry/index.js';
import type { ToolContext } from '@/tools/types.js';
import type { AgentAdapter, AgentResponse, RespondOptions } from './types.js';

export interface ChatCompletionAgentOptions {
  participant: Participant;
  /** System prompt; facilitator roster substitution happens before this point. */
  instructions?: string;
  /** Per-participant override of the default agent temperature. */
  temperature?: number;
  provider: LLMProvider;
  tools: ToolRegistry;
  settings: RuntimeSettings;
  conversationId: ConversationId;
  logger: Logger;
}

// ─── Thread ─────────────────────────────────────────────────────

/** Map the shared history onto this agent's point of view. */
function toProviderMessages(thread: readonly ChatMessage[], self: string): Message[] {
  return thread.map((message): Message =>
    message.author === self
      ? { role: 'assistant', content: message.content }
      : { role: 'user', content: `${message.author}: ${message.content}` },
  );
}

function toAssistantMessage(text: string, toolUses: ToolUse[]): Message {
  const content: MessageContent[] = [
    ...(text.length > 0 ? [{ type: 'text' as const, text }] : []),
    ...toolUses.map((t) => ({ type: 'tool_use' as const, ...t })),
  ];
  return { role: 'assistant', content };
}

// ─── Factory ────────────────────────────────────────────────────

export function createChatCompletionAgent(options: ChatCompletionAgentOptions): AgentAdapter {
  const { participant, instructions, provider, tools, settings, conversationId } = options;
  const logger = options.logger;
  const thread: ChatMessage[] = [];
  const seen = new Set<number>();

  let temperature: number | undefined;
  if (settings.supportsTemperature) {
    temperature = options.temperature ?? settings.defaultAgentTemperature;
    logger.info('Setting model temperature for agent', {
      component: 'chat-completion-agent',
      participant: participant.name,
      temperature,
    });
  } else {
    logger.info('Model does not support temperature; omitting it for agent', {
      component: 'chat-completion-agent',
      participant: participant.name,
      model: settings.model.model,
    });
  }

  function receive(message: ChatMessage): void {
    if (seen.has(message.sequenceIndex)) return;
    seen.add(message.sequenceIndex);
    thread.push(message);
    thread.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }

  async function executeToolCalls(
    toolUses: ToolUse[],
    context: ToolContext,
  ): Promise<Message[]> {
    const results: Message[] = [];

    for (const toolUse of toolUses) {
      const result = await tools.resolve(toolUse.name, toolUse.input, context);

      if (!result.ok) {
        logger.warn('Tool call failed', {
          component: 'chat-completion-agent',
          participant: participant.name,
          toolId: toolUse.name,
          error: result.error.message,
        });
        results.push({
          role: 'tool',
          content: [
            {
              type: 'tool_result',
              toolUseId: toolUse.id,
              content: `Error: ${result.error.message}`,
              isError: true,
            },
          ],
        });
        continue;
      }

      results.push({
        role: 'tool',
        content: [
          {
            type: 'tool_result',
            toolUseId: toolUse.id,
            content: JSON.stringify(result.value.output),
            isError: !result.value.success,
          },
        ],
      });
    }

    return results;
  }

  async function runToolLoop(abortSignal?: AbortSignal): Promise<string> {
    const conversation = toProviderMessages(thread, participant.name);
    const formattedTools =
      tools.listAll().length > 0 && provider.supportsToolUse()
        ? provider.formatTools(tools.formatForProvider())
        : undefined;
    const toolContext: ToolContext = {
      participantName: participant.name,
      conversationId,
      abortSignal,
    };

    for (let round = 0; ; round++) {
      const completion = await collectCompletion(
        provider.chat({
          messages: [...conversation],
          systemPrompt: instructions,
          tools: formattedTools,
          maxTokens: settings.maxOutputTokens,
          temperature,
          seed: settings.seed,
          abortSignal,
        }),
        abortSignal,
      );

      if (completion.toolUses.length === 0) {
        return completion.text;
      }

      if (round >= settings.maxToolRounds) {
        throw new AgentExecutionError(
          participant.name,
          `exceeded ${String(settings.maxToolRounds)} tool rounds in one turn`,
        );
      }

      logger.debug('Agent requested tools', {
        component: 'chat-completion-agent',
        participant: participant.name,
        round,
        tools: completion.toolUses.map((t) => t.name),
      });

      conversation.push(toAssistantMessage(completion.text, completion.toolUses));
      conversation.push(...(await executeToolCalls(completion.toolUses, toolContext)));
    }
  }

  return {
    participant,

    receive,

    async respond(
      history: readonly ChatMessage[],
      respondOptions?: RespondOptions,
    ): Promise<AgentResponse> {
      for (const message of history) {
        receive(message);
      }

      try {
        const content = await runToolLoop(respondOptions?.abortSignal);
        return { author: participant.name, content };
      } catch (error) {
        if (error instanceof AgentExecutionError) throw error;

        const message = error instanceof Error ? error.message : String(error);
        logger.error('Agent turn failed', {
          component: 'chat-completion-agent',
          participant: participant.name,
          error: message,
          code: error instanceof HuddleError ? error.code : undefined,
        });
        throw new AgentExecutionError(
          participant.name,
          message,
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
}
