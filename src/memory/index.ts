/**
 * Tiered memory: a session-scoped working tier plus episodic, semantic and
 * long-term tiers over a similarity index, coordinated by MemoryManager.
 */

export * from './types.js';
export * from './entry.js';
export * from './embeddings.js';
export * from './vector-store.js';
export * from './base-tier.js';
export * from './working.js';
export * from './episodic.js';
export * from './semantic.js';
export * from './longterm.js';
export * from './shared-state.js';
export * from './growth.js';
export * from './manager.js';
export * from './seed.js';
