/**
 * Fake tool implementations for testing.
 */
import { z } from 'zod';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { HuddleError } from '@/core/errors.js';
import type { ExecutableTool, ToolContext, ToolResult } from '@/tools/types.js';

const echoInput = z.object({ message: z.string() });

/** Echoes the input message back. */
export function createEchoTool(): ExecutableTool {
  return {
    id: 'echo',
    description: 'Echoes the input message back.',
    inputSchema: echoInput,

    execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, HuddleError>> {
      const parsed = echoInput.parse(input);
      return Promise.resolve(
        ok({
          success: true,
          output: { echo: parsed.message, caller: context.participantName },
          durationMs: 1,
        }),
      );
    },
  };
}

/** Always fails at execution time. */
export function createFailingTool(): ExecutableTool {
  return {
    id: 'broken',
    description: 'A tool whose backend is down.',
    inputSchema: z.object({}),

    execute(): Promise<Result<ToolResult, HuddleError>> {
      return Promise.resolve(err(new ToolExecutionError('broken', 'backend unavailable')));
    },
  };
}
