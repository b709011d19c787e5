// Tool system: registry, loaders, built-in definitions
export type { ExecutableTool, ToolContext, ToolDefinition, ToolResult } from './types.js';

export { createToolRegistry, toOpenAICompatibleSchema } from './registry/index.js';
export type { ToolRegistry, ToolRegistryOptions } from './registry/index.js';

export { buildAgentTools, createConversationHeaders } from './loader.js';
export type {
  BuildAgentToolsParams,
  FunctionToolCatalog,
  FunctionToolFactory,
  HeaderProvider,
  OpenApiToolLoader,
  OpenApiToolSource,
  ToolPluginContext,
} from './loader.js';

export { createOpenApiToolLoader } from './openapi/index.js';
export type { OpenApiLoaderDeps } from './openapi/index.js';

export { builtinToolCatalog, createCurrentTimeTool } from './definitions/index.js';
