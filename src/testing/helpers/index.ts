/**
 * In-process doubles for providers, classifiers and agents.
 */
export * from './test-llm-provider.js';
export * from './scripted-classifier.js';
export * from './scripted-agent.js';
