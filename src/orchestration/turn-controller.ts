/**
 * Turn controller: drives one round of the group conversation.
 *
 * awaiting_selection → agent_executing → awaiting_termination_check
 * (facilitator turns only) → loop | yielded | halted.
 *
 * Rounds are strictly sequential. The only suspension points are the
 * classifier and agent calls; the session's active flag is checked after
 * each of them, so an abandoned call can never append to history.
 */
import { resolveSelection } from '@/classifiers/selection.js';
import { resolveTermination } from '@/classifiers/termination.js';
import type { AgentAdapter } from '@/agents/types.js';
import {
  AgentExecutionError,
  ConfigurationError,
  HuddleError,
  SessionAbortedError,
  SessionError,
} from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ChatMessage } from '@/history/types.js';
import type { Participant } from '@/participants/types.js';
import type {
  ControllerState,
  RoundEndState,
  RoundOutcome,
  RunOptions,
  TurnController,
  TurnControllerDeps,
  TurnEvent,
} from './types.js';

export function createTurnController(deps: TurnControllerDeps): TurnController {
  const { conversationId, registry, adapters, history, selection, termination, maxIterations } =
    deps;
  const logger = deps.logger;

  let state: ControllerState = 'awaiting_selection';
  let iterationCount = 0;
  let running = false;

  function emit(event: TurnEvent): void {
    deps.onEvent?.(event);
  }

  /** Throw if the host aborted while a call was in flight. */
  function ensureActive(abortSignal?: AbortSignal): void {
    if (abortSignal?.aborted === true || !deps.isActive()) {
      throw new SessionAbortedError(conversationId);
    }
  }

  function adapterFor(participant: Participant): AgentAdapter {
    const adapter = adapters.get(participant.name);
    if (!adapter) {
      throw new ConfigurationError(`No agent adapter for participant "${participant.name}"`);
    }
    return adapter;
  }

  function publish(message: ChatMessage): void {
    for (const adapter of adapters.values()) {
      adapter.receive(message);
    }
  }

  async function selectSpeaker(abortSignal?: AbortSignal): Promise<Participant> {
    // Bootstrap: with only human input so far, the facilitator opens.
    if (history.all().every((message) => message.role === 'human')) {
      logger.info('Facilitator opens the round', {
        component: 'turn-controller',
        conversationId,
        participant: registry.facilitator.name,
      });
      emit({
        type: 'speaker_selected',
        participant: registry.facilitator.name,
        fellBack: false,
        bootstrap: true,
      });
      return registry.facilitator;
    }

    const verdict = await selection.classify({ history: history.all(), abortSignal });
    ensureActive(abortSignal);
    const { participant, fellBack } = resolveSelection(verdict, registry);

    if (fellBack) {
      logger.warn('Selection verdict names no participant, falling back to facilitator', {
        component: 'turn-controller',
        conversationId,
        verdict: verdict.verdict,
        facilitator: participant.name,
      });
    }
    logger.info('Speaker selected', {
      component: 'turn-controller',
      conversationId,
      participant: participant.name,
      reasoning: verdict.reasoning,
    });
    emit({
      type: 'speaker_selected',
      participant: participant.name,
      fellBack,
      bootstrap: false,
      reasoning: verdict.reasoning,
    });
    return participant;
  }

  /** Returns true when the facilitator's message hands control back to the human. */
  async function checkTermination(abortSignal?: AbortSignal): Promise<boolean> {
    const verdict = await termination.classify({ history: history.tail(1), abortSignal });
    ensureActive(abortSignal);

    const decision = resolveTermination(verdict);
    if (!decision.ok) {
      throw decision.error;
    }

    logger.info('Termination verdict', {
      component: 'turn-controller',
      conversationId,
      verdict: verdict.verdict,
      decision: decision.value,
      reasoning: verdict.reasoning,
    });
    emit({
      type: 'termination_checked',
      verdict: verdict.verdict,
      decision: decision.value,
      reasoning: verdict.reasoning,
    });
    return decision.value === 'stop';
  }

  function toHuddleError(error: unknown, abortSignal?: AbortSignal): HuddleError {
    if (abortSignal?.aborted === true || !deps.isActive()) {
      return error instanceof SessionAbortedError ? error : new SessionAbortedError(conversationId);
    }
    if (error instanceof HuddleError) return error;
    return new HuddleError({
      message: error instanceof Error ? error.message : String(error),
      code: 'ROUND_FAILED',
      cause: error instanceof Error ? error : undefined,
      context: { conversationId },
    });
  }

  return {
    get state(): ControllerState {
      return state;
    },

    get iterationCount(): number {
      return iterationCount;
    },

    get running(): boolean {
      return running;
    },

    publish,

    async run(options?: RunOptions): Promise<Result<RoundOutcome, HuddleError>> {
      if (running) {
        return err(new SessionError('A round is already running for this conversation', conversationId));
      }
      running = true;
      iterationCount = 0;

      const abortSignal = options?.abortSignal;
      const speakers: string[] = [];
      const appended: ChatMessage[] = [];

      const finish = (endState: RoundEndState): Result<RoundOutcome, HuddleError> => {
        state = endState;
        const outcome: RoundOutcome = { state: endState, iterations: iterationCount, speakers, appended };
        logger.info('Round complete', {
          component: 'turn-controller',
          conversationId,
          state: endState,
          iterations: iterationCount,
          speakers,
        });
        emit({ type: 'round_complete', outcome });
        return ok(outcome);
      };

      logger.info('Round started', {
        component: 'turn-controller',
        conversationId,
        historySize: history.size,
      });
      emit({ type: 'round_start', historySize: history.size });

      try {
        for (;;) {
          ensureActive(abortSignal);
          state = 'awaiting_selection';
          const speaker = await selectSpeaker(abortSignal);

          state = 'agent_executing';
          const response = await adapterFor(speaker).respond(history.all(), { abortSignal });
          ensureActive(abortSignal);
          if (response.author !== speaker.name) {
            throw new AgentExecutionError(
              speaker.name,
              `response attributed to "${response.author}"`,
            );
          }

          const message = history.append({
            author: speaker.name,
            role: 'agent',
            content: response.content,
          });
          iterationCount++;
          speakers.push(speaker.name);
          appended.push(message);
          publish(message);
          emit({ type: 'message_appended', message, iteration: iterationCount });

          // Only the facilitator may end a round.
          if (speaker.isFacilitator) {
            state = 'awaiting_termination_check';
            if (await checkTermination(abortSignal)) {
              return finish('yielded');
            }
          }

          if (iterationCount >= maxIterations) {
            logger.warn('Iteration ceiling reached, yielding to the human', {
              component: 'turn-controller',
              conversationId,
              maxIterations,
            });
            return finish('halted');
          }
        }
      } catch (error) {
        state = 'failed';
        const failure = toHuddleError(error, abortSignal);
        logger.error('Round failed', {
          component: 'turn-controller',
          conversationId,
          code: failure.code,
          error: failure.message,
          iterations: iterationCount,
        });
        emit({ type: 'error', error: failure });
        return err(failure);
      } finally {
        running = false;
      }
    },
  };
}
