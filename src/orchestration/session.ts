/**
 * Group chat session: wires participants, agents, classifiers and the turn
 * controller for one conversation, and exposes the human-facing operations.
 *
 * All configuration problems surface from `createGroupChatSession` before
 * any message is exchanged.
 */
import { createAgentAdapters } from '@/agents/agent-factory.js';
import type { SpecialAgentFactory } from '@/agents/types.js';
import {
  createSelectionClassifier,
  createTerminationClassifier,
} from '@/classifiers/llm-classifier.js';
import type { ClassifierDeps } from '@/classifiers/llm-classifier.js';
import type { DecisionClassifier } from '@/classifiers/types.js';
import type { RuntimeSettings } from '@/config/runtime.js';
import type { ParticipantConfig } from '@/config/types.js';
import { SessionAbortedError, SessionError, ValidationError } from '@/core/errors.js';
import type { HuddleError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ConversationId } from '@/core/types.js';
import { createHistoryStore } from '@/history/history-store.js';
import type { ChatMessage } from '@/history/types.js';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import { createParticipantRegistry } from '@/participants/participant-registry.js';
import { HUMAN_AUTHOR } from '@/participants/types.js';
import type { Participant } from '@/participants/types.js';
import { createProvider } from '@/providers/factory.js';
import type { ProviderFactory } from '@/providers/factory.js';
import { builtinToolCatalog } from '@/tools/definitions/index.js';
import type { FunctionToolCatalog, OpenApiToolLoader } from '@/tools/loader.js';
import { createOpenApiToolLoader } from '@/tools/openapi/openapi-loader.js';
import { createTurnController } from './turn-controller.js';
import type {
  ControllerState,
  RoundOutcome,
  RunOptions,
  TurnEventHandler,
} from './types.js';

// ─── Options ────────────────────────────────────────────────────

export interface ConversationContext {
  id: ConversationId;
  /** Message-shaped records of an earlier conversation to resume from. */
  history?: readonly unknown[];
}

export interface ClassifierPair {
  selection: DecisionClassifier;
  termination: DecisionClassifier;
}

/** Builds the selection and termination classifiers once the registry exists. */
export type ClassifierFactory = (deps: ClassifierDeps) => ClassifierPair;

export interface GroupChatSessionOptions {
  settings: RuntimeSettings;
  conversation: ConversationContext;
  participants: readonly ParticipantConfig[];
  providerFactory?: ProviderFactory;
  classifierFactory?: ClassifierFactory;
  toolCatalog?: FunctionToolCatalog;
  openApiLoader?: OpenApiToolLoader;
  specialAgentFactory?: SpecialAgentFactory;
  logger?: Logger;
  onEvent?: TurnEventHandler;
}

// ─── Session ────────────────────────────────────────────────────

export interface SessionState {
  /** Agent turns in the current or most recent round. */
  iterationCount: number;
  /** True once a round has yielded or halted, until the next human message. */
  terminated: boolean;
  controllerState: ControllerState;
  /** False after abort(). */
  active: boolean;
}

export interface GroupChatSession {
  readonly id: ConversationId;
  readonly participants: readonly Participant[];
  /** Full history, oldest first. */
  messages(): readonly ChatMessage[];
  /** Append a human message and deliver it to every agent. */
  addUserMessage(content: string): Result<ChatMessage, HuddleError>;
  /** Run agent turns until the round yields, halts or fails. */
  invoke(options?: RunOptions): Promise<Result<RoundOutcome, HuddleError>>;
  /** Stop the session. In-flight calls are cancelled and can no longer append. */
  abort(): void;
  state(): SessionState;
}

const defaultClassifiers: ClassifierFactory = (deps) => ({
  selection: createSelectionClassifier(deps),
  termination: createTerminationClassifier(deps),
});

/**
 * Create a session for one conversation.
 *
 * @throws ConfigurationError for participant or tool misconfiguration.
 * @throws ValidationError when the history to resume from is malformed.
 */
export async function createGroupChatSession(
  options: GroupChatSessionOptions,
): Promise<GroupChatSession> {
  const { settings, conversation } = options;
  const logger = (options.logger ?? createLogger({ name: 'group-chat' })).child({
    conversationId: conversation.id,
  });

  logger.info('Creating group chat session', {
    component: 'group-chat-session',
    participants: options.participants.map((p) => p.name),
    resumedMessages: conversation.history?.length ?? 0,
  });

  const registry = createParticipantRegistry({ configs: options.participants, logger });
  const history = createHistoryStore(conversation.history);
  const provider = (options.providerFactory ?? createProvider)(settings.model);

  const adapters = await createAgentAdapters({
    registry,
    settings,
    provider,
    conversationId: conversation.id,
    toolCatalog: options.toolCatalog ?? builtinToolCatalog,
    openApiLoader: options.openApiLoader ?? createOpenApiToolLoader(),
    specialAgentFactory: options.specialAgentFactory,
    logger,
  });

  const { selection, termination } = (options.classifierFactory ?? defaultClassifiers)({
    provider,
    registry,
    settings,
    logger,
  });

  const lifetime = new AbortController();
  let terminated = false;

  const controller = createTurnController({
    conversationId: conversation.id,
    registry,
    adapters,
    history,
    selection,
    termination,
    maxIterations: settings.maxIterations,
    isActive: () => !lifetime.signal.aborted,
    logger,
    onEvent: options.onEvent,
  });

  for (const message of history.all()) {
    controller.publish(message);
  }

  return {
    id: conversation.id,
    participants: registry.participants,

    messages(): readonly ChatMessage[] {
      return history.all();
    },

    addUserMessage(content: string): Result<ChatMessage, HuddleError> {
      if (lifetime.signal.aborted) {
        return err(new SessionError('Session has been aborted', conversation.id));
      }
      if (controller.running) {
        return err(
          new SessionError('Cannot add a message while a round is running', conversation.id),
        );
      }
      if (content.trim().length === 0) {
        return err(new ValidationError('Message content must not be empty'));
      }

      const message = history.append({ author: HUMAN_AUTHOR, role: 'human', content });
      terminated = false;
      controller.publish(message);
      logger.debug('User message added', {
        component: 'group-chat-session',
        sequenceIndex: message.sequenceIndex,
      });
      return ok(message);
    },

    async invoke(runOptions?: RunOptions): Promise<Result<RoundOutcome, HuddleError>> {
      if (lifetime.signal.aborted) {
        return err(new SessionAbortedError(conversation.id));
      }
      const abortSignal = runOptions?.abortSignal
        ? AbortSignal.any([lifetime.signal, runOptions.abortSignal])
        : lifetime.signal;

      const result = await controller.run({ abortSignal });
      if (result.ok) {
        terminated = true;
      }
      return result;
    },

    abort(): void {
      if (lifetime.signal.aborted) return;
      lifetime.abort();
      logger.info('Session aborted', { component: 'group-chat-session' });
    },

    state(): SessionState {
      return {
        iterationCount: controller.iterationCount,
        terminated,
        controllerState: controller.state,
        active: !lifetime.signal.aborted,
      };
    },
  };
}
