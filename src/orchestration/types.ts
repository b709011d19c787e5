import type { AgentAdapter } from '@/agents/types.js';
import type { DecisionClassifier, TerminationDecision } from '@/classifiers/types.js';
import type { HuddleError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import type { ConversationId } from '@/core/types.js';
import type { ChatMessage, HistoryStore } from '@/history/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ParticipantRegistry } from '@/participants/types.js';

// ─── State Machine ───────────────────────────────────────────────

export type ControllerState =
  | 'awaiting_selection'
  | 'agent_executing'
  | 'awaiting_termination_check'
  | 'yielded'
  | 'halted'
  | 'failed';

/** How a round ended when it did not fail. */
export type RoundEndState = Extract<ControllerState, 'yielded' | 'halted'>;

export interface RoundOutcome {
  /** `yielded` on a facilitator "yes", `halted` at the iteration ceiling. */
  state: RoundEndState;
  /** Agent turns completed in this round. */
  iterations: number;
  /** Speaker of each turn, in order. Repeats are allowed. */
  speakers: string[];
  /** Messages appended during this round. */
  appended: ChatMessage[];
}

// ─── Events ──────────────────────────────────────────────────────

export type TurnEvent =
  | { type: 'round_start'; historySize: number }
  | {
      type: 'speaker_selected';
      participant: string;
      /** True when the selection verdict named no participant. */
      fellBack: boolean;
      /** True when the facilitator opened without a classifier call. */
      bootstrap: boolean;
      reasoning?: string;
    }
  | { type: 'message_appended'; message: ChatMessage; iteration: number }
  | {
      type: 'termination_checked';
      verdict: string;
      decision: TerminationDecision;
      reasoning: string;
    }
  | { type: 'round_complete'; outcome: RoundOutcome }
  | { type: 'error'; error: HuddleError };

export type TurnEventHandler = (event: TurnEvent) => void;

// ─── Controller ──────────────────────────────────────────────────

export interface TurnControllerDeps {
  conversationId: ConversationId;
  registry: ParticipantRegistry;
  adapters: ReadonlyMap<string, AgentAdapter>;
  history: HistoryStore;
  selection: DecisionClassifier;
  termination: DecisionClassifier;
  /** Agent turns allowed per round before the loop halts. */
  maxIterations: number;
  /** The session's active flag; checked before every append. */
  isActive: () => boolean;
  logger: Logger;
  onEvent?: TurnEventHandler;
}

export interface RunOptions {
  abortSignal?: AbortSignal;
}

export interface TurnController {
  /**
   * Run one round: select, dispatch, append, and check termination until the
   * facilitator yields or the ceiling is reached. Failures are returned,
   * never retried.
   */
  run(options?: RunOptions): Promise<Result<RoundOutcome, HuddleError>>;
  /** Deliver an appended message to every adapter. */
  publish(message: ChatMessage): void;
  readonly state: ControllerState;
  /** Agent turns completed in the current or most recent round. */
  readonly iterationCount: number;
  readonly running: boolean;
}
