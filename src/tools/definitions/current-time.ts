/**
 * current_time tool: the current date and time, optionally in an IANA timezone.
 *
 * Uses built-in Date + Intl.DateTimeFormat APIs (no external libs).
 */
import { z } from 'zod';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { HuddleError } from '@/core/errors.js';
import type { ExecutableTool, ToolContext, ToolResult } from '@/tools/types.js';

const inputSchema = z.object({
  timezone: z.string().min(1).optional().describe('IANA timezone, e.g. "Europe/Madrid"'),
});

export interface CurrentTimeToolOptions {
  /** Clock override for tests. */
  now?: () => Date;
}

function validateTimezone(tz: string): void {
  try {
    Intl.DateTimeFormat(undefined, { timeZone: tz });
  } catch {
    throw new Error(`Invalid timezone: "${tz}"`);
  }
}

/** Create the current_time tool. */
export function createCurrentTimeTool(options?: CurrentTimeToolOptions): ExecutableTool {
  const clock = options?.now ?? ((): Date => new Date());

  return {
    id: 'current_time',
    description:
      'Returns the current date and time. Pass an IANA timezone to get the local time there; ' +
      'otherwise the time is given in UTC.',
    inputSchema,

    execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, HuddleError>> {
      void context;
      const parsed = inputSchema.parse(input);
      const now = clock();

      try {
        const timezone = parsed.timezone ?? 'UTC';
        validateTimezone(timezone);
        return Promise.resolve(
          ok({
            success: true,
            output: {
              iso: now.toISOString(),
              timezone,
              local: now.toLocaleString('en-US', {
                timeZone: timezone,
                dateStyle: 'full',
                timeStyle: 'long',
              }),
            },
            durationMs: 0,
          }),
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return Promise.resolve(err(new ToolExecutionError('current_time', message)));
      }
    },
  };
}
