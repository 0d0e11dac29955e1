/**
 * Discovery - resolves raw contacts into validated Prospects
 */

export * from './discovery-agent.js';
export * from './extract.js';
