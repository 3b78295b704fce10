export * from './types.js';
export { ExplorationTracker, buildThreadNarrative, type ExplorationTrackerOptions } from './tracker.js';
