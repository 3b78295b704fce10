import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { MnemosError, ValidationError } from '../core/errors.js';

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['simple', 'ollama', 'openai']).default('simple'),
  model: z.string().optional(),
  url: z.string().url().optional(),
});

export const MemoryConfigSchema = z.object({
  workingMaxTurns: z.number().int().positive().default(20),
  workingMaxRetrieved: z.number().int().positive().default(10),
  activeTopicWindow: z.number().int().positive().default(10),
  consolidationInterval: z.number().int().positive().default(10),
  sessionRestart: z.enum(['close-previous', 'reject']).default('close-previous'),
});

export const ExplorationConfigSchema = z.object({
  missingThreadPolicy: z.enum(['strict', 'start-new']).default('strict'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  embeddings: EmbeddingsConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  exploration: ExplorationConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type ExplorationConfig = z.infer<typeof ExplorationConfigSchema>;

export const MNEMOS_DIR = '.mnemos';
export const CONFIG_FILE = 'config.json';
export const MEMORY_DB = 'memory.db';
export const EXPLORATION_DB = 'exploration.db';
export const SHARED_STATE_FILE = 'shared-state.json';

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (currentDir !== path.dirname(currentDir)) {
    const mnemosPath = path.join(currentDir, MNEMOS_DIR);
    if (fs.existsSync(mnemosPath) && fs.statSync(mnemosPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getMnemosPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new MnemosError('NOT_FOUND', 'No memory store here. Run `mnemos init` first.');
  }
  return path.join(root, MNEMOS_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getMnemosPath(projectRoot), CONFIG_FILE);
}

export function getMemoryDbPath(projectRoot?: string): string {
  return path.join(getMnemosPath(projectRoot), MEMORY_DB);
}

export function getExplorationDbPath(projectRoot?: string): string {
  return path.join(getMnemosPath(projectRoot), EXPLORATION_DB);
}

export function getSharedStatePath(projectRoot?: string): string {
  return path.join(getMnemosPath(projectRoot), SHARED_STATE_FILE);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return ConfigSchema.parse({});
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): string {
  const mnemosPath = path.join(targetDir, MNEMOS_DIR);

  if (fs.existsSync(mnemosPath) && !force) {
    throw new ValidationError('Memory store already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(mnemosPath, { recursive: true, mode: 0o700 });

  const defaultConfig = ConfigSchema.parse({});
  fs.writeFileSync(
    path.join(mnemosPath, CONFIG_FILE),
    JSON.stringify(defaultConfig, null, 2),
    { mode: 0o600 }
  );

  const gitignorePath = path.join(mnemosPath, '.gitignore');
  fs.writeFileSync(gitignorePath, `# mnemos local files
*.db
*.db-journal
*.db-wal
*.db-shm
${SHARED_STATE_FILE}
`);

  return mnemosPath;
}

type ConfigNode = { [key: string]: unknown };

function isNode(value: unknown): value is ConfigNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a dotted key, coercing `value` to the type of the current value.
 */
export function setConfigValue(key: string, value: string, projectRoot?: string): Config {
  const config: ConfigNode = { ...loadConfig(projectRoot) };
  const keys = key.split('.');
  const lastKey = keys[keys.length - 1];

  let current = config;
  for (const k of keys.slice(0, -1)) {
    const child = current[k];
    if (!isNode(child)) {
      throw new ValidationError(`Invalid config key: ${key}`);
    }
    const copy = { ...child };
    current[k] = copy;
    current = copy;
  }

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      throw new ValidationError(`Config ${key} expects a number, got "${value}"`);
    }
    current[lastKey] = parsed;
  } else if (typeof existingValue === 'boolean') {
    current[lastKey] = value === 'true';
  } else {
    current[lastKey] = value;
  }

  const validated = ConfigSchema.safeParse(config);
  if (!validated.success) {
    throw ValidationError.fromZod(`config value for ${key}`, validated.error);
  }
  saveConfig(validated.data, projectRoot);
  return validated.data;
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);

  let current: unknown = config;
  for (const k of key.split('.')) {
    if (!isNode(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
