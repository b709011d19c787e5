export { createOpenApiToolLoader } from './openapi-loader.js';
export type { OpenApiLoaderDeps } from './openapi-loader.js';
