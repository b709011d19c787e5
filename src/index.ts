// Huddle: turn-taking controller for multi-agent group conversations
export * from './core/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './participants/index.js';
export * from './history/index.js';
export * from './prompts/index.js';
export * from './providers/index.js';
export * from './tools/index.js';
export * from './classifiers/index.js';
export * from './agents/index.js';
export * from './orchestration/index.js';
