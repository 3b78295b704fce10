import { loadConfig, getExplorationDbPath, getMemoryDbPath, getSharedStatePath, type Config } from './config/index.js';
import { createConsoleLogger, type Logger } from './core/logger.js';
import type { Clock } from './core/clock.js';
import { ExplorationTracker } from './exploration/tracker.js';
import type { IntrospectionJournal } from './exploration/types.js';
import { createEmbedder } from './memory/embeddings.js';
import { MemoryManager } from './memory/manager.js';
import { FileSharedState } from './memory/shared-state.js';
import { VectorStore } from './memory/vector-store.js';

export interface Runtime {
  config: Config;
  manager: MemoryManager;
  tracker: ExplorationTracker;
  close(): void;
}

export interface RuntimeOptions {
  logger?: Logger;
  clock?: Clock;
  journal?: IntrospectionJournal;
}

/**
 * Open the stores under `<projectRoot>/.mnemos` and wire a manager and
 * thread tracker from the project's config.
 */
export async function openRuntime(projectRoot: string, options: RuntimeOptions = {}): Promise<Runtime> {
  const config = loadConfig(projectRoot);
  const logger = options.logger ?? createConsoleLogger();

  const embedder = await createEmbedder(config.embeddings);
  const store = new VectorStore(getMemoryDbPath(projectRoot), embedder);

  let tracker: ExplorationTracker;
  try {
    tracker = new ExplorationTracker(getExplorationDbPath(projectRoot), {
      clock: options.clock,
      logger,
      journal: options.journal,
      missingThreadPolicy: config.exploration.missingThreadPolicy,
    });
  } catch (error) {
    store.close();
    throw error;
  }

  const manager = new MemoryManager({
    backend: store,
    sharedState: new FileSharedState(getSharedStatePath(projectRoot), logger, options.clock),
    logger,
    clock: options.clock,
    settings: {
      working: {
        maxTurns: config.memory.workingMaxTurns,
        maxRetrieved: config.memory.workingMaxRetrieved,
        topicWindow: config.memory.activeTopicWindow,
      },
      consolidationInterval: config.memory.consolidationInterval,
      sessionRestart: config.memory.sessionRestart,
    },
  });

  logger.debug(`Opened memory store with ${store.embedderName} embeddings`);

  return {
    config,
    manager,
    tracker,
    close() {
      tracker.close();
      store.close();
    },
  };
}
