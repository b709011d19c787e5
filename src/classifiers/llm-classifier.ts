/**
 * LLM-backed decision classifiers.
 * Render a prompt over the given history view, ask the backend for a
 * structured verdict with a fixed seed (and temperature 0 where the model
 * takes one), and parse the reply strictly.
 */
import type { RuntimeSettings } from '@/config/runtime.js';
import { HuddleError, ProviderError } from '@/core/errors.js';
import type { ChatMessage } from '@/history/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ParticipantRegistry } from '@/participants/types.js';
import { buildSelectionPrompt, buildTerminationPrompt } from '@/prompts/prompt-builder.js';
import { collectCompletion } from '@/providers/stream.js';
import type { LLMProvider } from '@/providers/types.js';
import type { ClassifierKind, ClassifyInput, DecisionClassifier, Verdict } from './types.js';
import { parseVerdict, VERDICT_RESPONSE_FORMAT } from './verdict.js';

const CLASSIFIER_MAX_TOKENS = 1024;

// ─── Options ────────────────────────────────────────────────────

export interface LLMClassifierOptions {
  kind: ClassifierKind;
  provider: LLMProvider;
  settings: Pick<RuntimeSettings, 'seed' | 'supportsTemperature'>;
  /** Renders the prompt for the history view this classifier receives. */
  renderPrompt: (history: readonly ChatMessage[]) => string;
  logger: Logger;
}

// ─── Factory ────────────────────────────────────────────────────

export function createLLMClassifier(options: LLMClassifierOptions): DecisionClassifier {
  const { kind, provider, settings, renderPrompt, logger } = options;

  return {
    kind,

    async classify(input: ClassifyInput): Promise<Verdict> {
      const prompt = renderPrompt(input.history);

      let text: string;
      try {
        const completion = await collectCompletion(
          provider.chat({
            messages: [{ role: 'user', content: prompt }],
            maxTokens: CLASSIFIER_MAX_TOKENS,
            seed: settings.seed,
            temperature: settings.supportsTemperature ? 0 : undefined,
            responseFormat: VERDICT_RESPONSE_FORMAT,
            abortSignal: input.abortSignal,
          }),
          input.abortSignal,
        );
        text = completion.text;
      } catch (error) {
        if (error instanceof HuddleError) throw error;
        throw new ProviderError(
          provider.id,
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined,
        );
      }

      const verdict = parseVerdict(text, kind);

      logger.debug('Classifier verdict', {
        component: `${kind}-classifier`,
        verdict: verdict.verdict,
        reasoning: verdict.reasoning,
      });

      return verdict;
    },
  };
}

// ─── Instantiations ─────────────────────────────────────────────

export interface ClassifierDeps {
  provider: LLMProvider;
  registry: ParticipantRegistry;
  settings: Pick<RuntimeSettings, 'seed' | 'supportsTemperature'>;
  logger: Logger;
}

/** Chooses the next speaker from the full history. */
export function createSelectionClassifier(deps: ClassifierDeps): DecisionClassifier {
  return createLLMClassifier({
    kind: 'selection',
    provider: deps.provider,
    settings: deps.settings,
    logger: deps.logger,
    renderPrompt: (history) =>
      buildSelectionPrompt({
        participants: deps.registry.participants,
        facilitator: deps.registry.facilitator.name,
        history,
      }),
  });
}

/** Decides from the most recent message whether to yield to the human. */
export function createTerminationClassifier(deps: ClassifierDeps): DecisionClassifier {
  return createLLMClassifier({
    kind: 'termination',
    provider: deps.provider,
    settings: deps.settings,
    logger: deps.logger,
    renderPrompt: (history) =>
      buildTerminationPrompt({
        participants: deps.registry.participants,
        history: history.slice(-1),
      }),
  });
}
