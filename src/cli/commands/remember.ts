import { Command, Option } from '@commander-js/extra-typings';
import type { RememberRequest } from '../../memory/manager.js';
import {
  CONSOLIDATION_TYPES,
  DURABLE_TIERS,
  EMOTIONAL_VALENCES,
  KNOWLEDGE_CATEGORIES,
  type EntryInput,
} from '../../memory/types.js';
import { exitWithError, parseList, parseUnit, withRuntime } from '../context.js';
import { formatMemory, success } from '../ui.js';

export const rememberCommand = new Command('remember')
  .description('Store a memory in a durable tier')
  .argument('<content...>', 'What to remember')
  .addOption(new Option('-t, --tier <tier>', 'Memory tier').choices(DURABLE_TIERS).default('semantic'))
  .option('-i, --importance <n>', 'Importance from 0 to 1', parseUnit)
  .addOption(new Option('-e, --emotion <valence>', 'Emotional valence').choices(EMOTIONAL_VALENCES))
  .option('--intensity <n>', 'Emotional intensity from 0 to 1', parseUnit)
  .option('--tags <tags>', 'Comma-separated tags', parseList)
  .addOption(new Option('-c, --category <category>', 'Fact category (semantic)').choices(KNOWLEDGE_CATEGORIES))
  .option('--confidence <n>', 'Fact confidence from 0 to 1 (semantic)', parseUnit)
  .option('--supersedes <id>', 'Id of the fact this one replaces (semantic)')
  .addOption(new Option('--type <type>', 'Consolidation type (longterm)').choices(CONSOLIDATION_TYPES))
  .action(async (words, options) => {
    const content = words.join(' ');
    const base: Omit<EntryInput, 'content' | 'source' | 'relatedIds'> = {
      importance: options.importance,
      emotionalValence: options.emotion,
      emotionalIntensity: options.intensity,
      tags: options.tags,
    };

    let request: RememberRequest;
    switch (options.tier) {
      case 'episodic':
        request = { tier: 'episodic', ...base, source: 'cli' };
        break;
      case 'semantic':
        request = {
          tier: 'semantic',
          importance: base.importance,
          tags: base.tags,
          source: 'cli',
          category: options.category,
          confidence: options.confidence,
          supersedes: options.supersedes,
        };
        break;
      case 'longterm':
        request = { tier: 'longterm', ...base, consolidationType: options.type };
        break;
    }

    try {
      const entry = await withRuntime(({ manager }) => manager.remember(content, request));
      console.log(success(`Stored in ${entry.tier} memory:`));
      console.log(formatMemory(entry, { showId: true }));
    } catch (error) {
      exitWithError(error);
    }
  });
