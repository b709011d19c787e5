/**
 * Drains a provider's chat stream into one completed reply.
 */
import { HuddleError } from '@/core/errors.js';
import type { ChatEvent, StopReason, TokenUsage } from './types.js';

export interface ToolUse {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface CollectedCompletion {
  text: string;
  toolUses: ToolUse[];
  usage: TokenUsage;
  stopReason: StopReason;
}

/**
 * Collect text, tool calls and usage from a chat stream.
 * Stream `error` events are rethrown; an abort raises a HuddleError with code `ABORTED`.
 */
export async function collectCompletion(
  stream: AsyncIterable<ChatEvent>,
  abortSignal?: AbortSignal,
): Promise<CollectedCompletion> {
  const textParts: string[] = [];
  const toolUses: ToolUse[] = [];
  let usage: TokenUsage | undefined;
  let stopReason: StopReason | undefined;

  for await (const event of stream) {
    if (abortSignal?.aborted) {
      throw new HuddleError({
        message: 'LLM call aborted',
        code: 'ABORTED',
        statusCode: 499,
      });
    }

    switch (event.type) {
      case 'content_delta':
        textParts.push(event.text);
        break;
      case 'tool_use_end':
        toolUses.push({ id: event.id, name: event.name, input: event.input });
        break;
      case 'message_end':
        usage = event.usage;
        stopReason = event.stopReason;
        break;
      case 'error':
        throw event.error;
    }
  }

  if (!usage || !stopReason) {
    throw new HuddleError({
      message: 'LLM stream ended without usage or stop reason',
      code: 'STREAM_INCOMPLETE',
      statusCode: 502,
    });
  }

  return { text: textParts.join(''), toolUses, usage, stopReason };
}
