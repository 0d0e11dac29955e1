/**
 * Research - cited research records built from search hits
 */

export * from './research-agent.js';
export * from './topics.js';
export * from './angle-builder.js';
