/**
 * E2E test helpers.
 * Builds full sessions whose agents and classifiers run against scripted
 * in-process providers, so every layer below the session is exercised.
 */
import {
  createSelectionClassifier,
  createTerminationClassifier,
} from '@/classifiers/llm-classifier.js';
import { resolveRuntimeSettings } from '@/config/runtime.js';
import type { Logger } from '@/observability/logger.js';
import { createGroupChatSession } from '@/orchestration/session.js';
import type { GroupChatSession } from '@/orchestration/session.js';
import type { TurnEvent } from '@/orchestration/types.js';
import type { ChatParams } from '@/providers/types.js';
import { TEST_CONVERSATION_ID } from '@/testing/fixtures/context.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createTeamConfigs } from '@/testing/fixtures/participants.js';
import { createMockLLMProvider } from '@/testing/helpers/test-llm-provider.js';
import type { MockLLMProvider } from '@/testing/helpers/test-llm-provider.js';

export interface ScenarioSession {
  session: GroupChatSession;
  /** Serves agent turns, in call order across all agents. */
  agentProvider: MockLLMProvider;
  /** Serves selection and termination calls, in call order. */
  classifierProvider: MockLLMProvider;
  events: TurnEvent[];
  logger: Logger;
}

/** A classifier reply in the JSON shape the classifiers request. */
export function verdictJson(verdict: string, reasoning = 'scenario'): string {
  return JSON.stringify({ reasoning, verdict });
}

/** The prompt text of a classifier call. */
export function promptOf(call: ChatParams | undefined): string {
  const content = call?.messages[0]?.content;
  return typeof content === 'string' ? content : '';
}

export async function createScenarioSession(params: {
  agentTurns: string[];
  classifierTurns: string[];
}): Promise<ScenarioSession> {
  const agentProvider = createMockLLMProvider({ id: 'mock:agents', turns: params.agentTurns });
  const classifierProvider = createMockLLMProvider({
    id: 'mock:classifiers',
    turns: params.classifierTurns,
  });
  const events: TurnEvent[] = [];
  const logger = createMockLogger();

  const session = await createGroupChatSession({
    settings: resolveRuntimeSettings({ model: { provider: 'openai', model: 'gpt-4o' } }),
    conversation: { id: TEST_CONVERSATION_ID },
    participants: createTeamConfigs(),
    providerFactory: () => agentProvider,
    classifierFactory: (deps) => ({
      selection: createSelectionClassifier({ ...deps, provider: classifierProvider }),
      termination: createTerminationClassifier({ ...deps, provider: classifierProvider }),
    }),
    logger,
    onEvent: (event) => events.push(event),
  });

  return { session, agentProvider, classifierProvider, events, logger };
}
