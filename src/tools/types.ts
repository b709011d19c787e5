import type { z } from 'zod';
import type { ConversationId } from '@/core/types.js';
import type { Result } from '@/core/result.js';
import type { HuddleError } from '@/core/errors.js';

// ─── Tool Context ───────────────────────────────────────────────

/** Passed to every tool call and to tool factories. */
export interface ToolContext {
  /** Participant whose turn triggered the call. */
  participantName: string;
  conversationId: ConversationId;
  abortSignal?: AbortSignal;
}

// ─── Tool Definition ────────────────────────────────────────────

export interface ToolDefinition {
  readonly id: string;
  readonly description: string;
  readonly inputSchema: z.ZodType;
  /**
   * Provider-facing JSON schema, sent as-is instead of converting
   * `inputSchema`. Used by tools described by an external document.
   */
  readonly parametersJsonSchema?: Record<string, unknown>;
}

// ─── Tool Result ────────────────────────────────────────────────

export interface ToolResult {
  success: boolean;
  output: unknown;
  error?: string;
  durationMs: number;
  metadata?: Record<string, unknown>;
}

// ─── Executable Tool ────────────────────────────────────────────

export interface ExecutableTool extends ToolDefinition {
  execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, HuddleError>>;
}
