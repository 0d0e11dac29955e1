/**
 * Pipeline - orchestrator, item lifecycle and run manifest
 */

export * from './types.js';
export * from './item-state.js';
export * from './run-manifest.js';
export * from './orchestrator.js';
