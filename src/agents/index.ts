export * from './define-agent.js';
export * from './memory.agent.js';
