// Classifier prompts and facilitator instructions
export {
  buildFacilitatorInstructions,
  buildSelectionPrompt,
  buildTerminationPrompt,
  formatAgentRoster,
  formatHistory,
  interpolate,
} from './prompt-builder.js';
export { SELECTION_TEMPLATE, TERMINATION_TEMPLATE } from './templates.js';
