#!/usr/bin/env node
/**
 * Interactive terminal chat with a configured group of agents.
 *
 * Usage: huddle [--config <file>]
 */
import { randomUUID } from 'node:crypto';
import { realpathSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';

import { config as loadEnv } from 'dotenv';

import { loadHuddleConfig } from '@/config/loader.js';
import type { HuddleConfigFile } from '@/config/loader.js';
import { resolveRuntimeSettings } from '@/config/runtime.js';
import type { HuddleError } from '@/core/errors.js';
import type { ConversationId } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import { createGroupChatSession } from '@/orchestration/session.js';
import type { GroupChatSession } from '@/orchestration/session.js';
import type { RoundOutcome, TurnEvent } from '@/orchestration/types.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const MAGENTA = '\x1b[35m';

// ─── CLI Arg Parsing ────────────────────────────────────────────

interface CliArgs {
  configPath: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configPath: 'huddle.json' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--config' || arg === '-c') && next) {
      args.configPath = next;
      i++;
    }
  }

  return args;
}

// ─── Command Parsing ────────────────────────────────────────────

interface Command {
  type: 'quit' | 'new' | 'help' | 'message';
  text?: string;
}

export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (!trimmed) return { type: 'message', text: '' };

  if (trimmed === '/quit' || trimmed === '/exit' || trimmed === '/q') {
    return { type: 'quit' };
  }
  if (trimmed === '/new') {
    return { type: 'new' };
  }
  if (trimmed === '/help' || trimmed === '/h') {
    return { type: 'help' };
  }
  return { type: 'message', text: trimmed };
}

// ─── Event Formatting ───────────────────────────────────────────

/** One printable line per controller event, or undefined for silent events. */
export function formatTurnEvent(event: TurnEvent): string | undefined {
  switch (event.type) {
    case 'speaker_selected':
      return `${DIM}  [next] ${event.participant}${event.fellBack ? ' (fallback)' : ''}${RESET}`;
    case 'message_appended':
      return `${MAGENTA}${event.message.author}:${RESET} ${event.message.content}`;
    case 'termination_checked':
      return `${DIM}  [yield to user] ${event.decision === 'stop' ? 'yes' : 'no'}${RESET}`;
    case 'round_start':
    case 'round_complete':
    case 'error':
      return undefined;
  }
}

export function formatOutcome(outcome: RoundOutcome): string {
  const turns = `${String(outcome.iterations)} turn${outcome.iterations === 1 ? '' : 's'}`;
  if (outcome.state === 'halted') {
    return `${YELLOW}  Turn limit reached after ${turns}. Your move.${RESET}`;
  }
  return `${DIM}  (${turns})${RESET}`;
}

export function formatError(error: HuddleError): string {
  return `${RED}Error [${error.code}]: ${error.message}${RESET}`;
}

// ─── Help ───────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
${BOLD}Commands:${RESET}
  ${CYAN}/help${RESET}    Show this help
  ${CYAN}/new${RESET}     Start a new conversation
  ${CYAN}/quit${RESET}    Exit the chat
  ${CYAN}Ctrl+C${RESET}   Exit the chat
`);
}

// ─── Main Chat Loop ─────────────────────────────────────────────

async function main(): Promise<void> {
  loadEnv();
  const args = parseCliArgs(process.argv.slice(2));

  const loaded = await loadHuddleConfig(args.configPath);
  if (!loaded.ok) {
    console.log(formatError(loaded.error));
    const issues = loaded.error.context?.['issues'];
    if (Array.isArray(issues)) {
      for (const issue of issues) console.log(`${DIM}  ${JSON.stringify(issue)}${RESET}`);
    }
    process.exit(1);
  }
  const config: HuddleConfigFile = loaded.value;
  const settings = resolveRuntimeSettings(config);
  const logger = createLogger({ name: 'huddle', level: process.env['LOG_LEVEL'] ?? 'warn' });

  const startSession = (): Promise<GroupChatSession> =>
    createGroupChatSession({
      settings,
      conversation: { id: randomUUID() as ConversationId },
      participants: config.participants,
      logger,
      onEvent: (event) => {
        const line = formatTurnEvent(event);
        if (line) console.log(line);
      },
    });

  let session = await startSession();

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  // Banner
  console.log(`\n${BOLD}${CYAN}  Huddle Group Chat${RESET}`);
  console.log(`${DIM}  Participants: ${session.participants.map((p) => p.name).join(', ')}${RESET}`);
  console.log(`${DIM}  Type /help for commands, /quit to exit${RESET}\n`);

  async function sendMessage(text: string): Promise<void> {
    const added = session.addUserMessage(text);
    if (!added.ok) {
      console.log(formatError(added.error));
      return;
    }
    const result = await session.invoke();
    console.log(result.ok ? formatOutcome(result.value) : formatError(result.error));
    console.log('');
  }

  function prompt(): void {
    rl.question(`${GREEN}You:${RESET} `, (input) => {
      const cmd = parseCommand(input);

      switch (cmd.type) {
        case 'quit':
          rl.close();
          break;

        case 'new':
          session.abort();
          startSession()
            .then((next) => {
              session = next;
              console.log(`${YELLOW}Conversation cleared. Starting fresh.${RESET}\n`);
              prompt();
            })
            .catch((e: unknown) => {
              console.error('Fatal error:', e);
              process.exit(1);
            });
          break;

        case 'help':
          printHelp();
          prompt();
          break;

        case 'message':
          if (!cmd.text) {
            prompt();
            return;
          }
          sendMessage(cmd.text)
            .then(prompt)
            .catch((e: unknown) => {
              console.error('Fatal error:', e);
              process.exit(1);
            });
          break;
      }
    });
  }

  // Handle Ctrl+C and /quit
  rl.on('close', () => {
    session.abort();
    console.log(`\n${DIM}Goodbye!${RESET}\n`);
    process.exit(0);
  });

  prompt();
}

// ─── Entry Point ────────────────────────────────────────────────

// Only run when invoked directly (not when imported for testing)
const invokedPath = process.argv[1];
if (invokedPath && realpathSync(invokedPath) === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error('Fatal error:', e);
    process.exit(1);
  });
}
