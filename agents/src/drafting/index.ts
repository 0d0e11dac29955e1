/**
 * Drafting - pitch strategies and the drafting agent
 */

export * from './types.js';
export * from './template-strategy.js';
export * from './generative-strategy.js';
export * from './drafting-agent.js';
