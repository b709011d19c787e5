import type { ChatMessage } from '@/history/types.js';

// ─── Verdict ─────────────────────────────────────────────────────

/** Structured output of one classifier call. */
export interface Verdict {
  verdict: string;
  reasoning: string;
}

// ─── Classifier ──────────────────────────────────────────────────

export type ClassifierKind = 'selection' | 'termination';

export interface ClassifyInput {
  /**
   * The view of history this classifier is allowed to see:
   * the full history for selection, the last message for termination.
   */
  history: readonly ChatMessage[];
  abortSignal?: AbortSignal;
}

/**
 * A decision function over history. Implementations throw
 * ClassifierParseError on malformed output and ProviderError on
 * backend failure; they never default a verdict.
 */
export interface DecisionClassifier {
  readonly kind: ClassifierKind;
  classify(input: ClassifyInput): Promise<Verdict>;
}

// ─── Resolved Decisions ─────────────────────────────────────────

export type TerminationDecision = 'stop' | 'continue';
