/**
 * Model capabilities the orchestrator depends on.
 * Names are matched as case-insensitive substrings so deployment names like
 * "prod-o3-mini-eu" are recognised too.
 */

/** Reasoning models reject a sampling temperature. */
const NON_TEMPERATURE_MODELS = [
  'o1',
  'o1-mini',
  'o3',
  'o3-mini',
  'o3-pro',
  'o4-mini',
  'gpt-5',
  'gpt-5-mini',
  'gpt-5-nano',
  'DeepSeek-R1',
];

/** Models served without function calling. */
const NON_TOOL_MODELS = ['o1-mini', 'o1-preview', 'DeepSeek-R1'];

function matchesAny(model: string, names: readonly string[]): boolean {
  const lower = model.toLowerCase();
  return names.some((name) => lower.includes(name.toLowerCase()));
}

/** Whether the model accepts a `temperature` parameter. */
export function modelSupportsTemperature(model: string): boolean {
  return !matchesAny(model, NON_TEMPERATURE_MODELS);
}

/** Whether the model can be offered tools. */
export function modelSupportsTools(model: string): boolean {
  return !matchesAny(model, NON_TOOL_MODELS);
}
