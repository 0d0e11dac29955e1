/**
 * @pitchline/agents - Agent implementations
 *
 * - shared/    : BaseAgent, stage result types, text helpers
 * - search/    : search providers (offline stub, SerpAPI)
 * - discovery/ : raw contact -> prospect
 * - research/  : prospect -> cited research record
 * - drafting/  : prospect + research -> pitch (template / generative)
 * - pipeline/  : orchestrator, item lifecycle, run manifest
 */

export * from './shared/index.js';
export * from './search/index.js';
export * from './discovery/index.js';
export * from './research/index.js';
export * from './drafting/index.js';
export * from './pipeline/index.js';
