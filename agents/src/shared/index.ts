export * from './base-agent.js';
export * from './types.js';
export * from './text.js';
