// Decision classifiers: speaker selection and round termination
export type {
  ClassifierKind,
  ClassifyInput,
  DecisionClassifier,
  TerminationDecision,
  Verdict,
} from './types.js';
export { parseVerdict, verdictSchema, VERDICT_RESPONSE_FORMAT } from './verdict.js';
export { resolveSelection } from './selection.js';
export type { SelectionResult } from './selection.js';
export { resolveTermination } from './termination.js';
export {
  createLLMClassifier,
  createSelectionClassifier,
  createTerminationClassifier,
} from './llm-classifier.js';
export type { ClassifierDeps, LLMClassifierOptions } from './llm-classifier.js';
