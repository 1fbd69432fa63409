export * from './agent-registry.js';
