export { createToolRegistry, toOpenAICompatibleSchema } from './tool-registry.js';
export type { ToolRegistry, ToolRegistryOptions } from './tool-registry.js';
