// Built-in function tools
import type { FunctionToolCatalog } from '../loader.js';
import { createCurrentTimeTool } from './current-time.js';

export { createCurrentTimeTool } from './current-time.js';
export type { CurrentTimeToolOptions } from './current-time.js';

/** Function tools available to every configuration by name. */
export const builtinToolCatalog: FunctionToolCatalog = {
  current_time: () => createCurrentTimeTool(),
};
