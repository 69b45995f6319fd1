import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../middleware/logger.js';
import { defaultSnapshot } from './defaults.js';
import type { Env } from './env.js';
import { fromStored, storedConfigSchema, toStored } from './schema.js';
import { InMemoryConfigStore } from './store.js';
import type { ConfigSnapshot } from './types.js';

export const CONFIG_FILE_NAME = 'gateway-config.json';
export const LEGACY_CONFIG_FILE_NAME = 'ai-config.json';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(filePath: string): Promise<ConfigSnapshot | undefined> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }

  const snapshot = fromStored(storedConfigSchema.parse(JSON.parse(raw)));
  return Object.keys(snapshot.providers).length > 0 ? snapshot : undefined;
}

/**
 * Provider settings persisted as JSON under the data directory.
 *
 * Load order: the gateway config file, then the legacy `ai-config.json` (migrated
 * into the config file), then environment defaults (written out).
 */
export class JsonFileConfigStore extends InMemoryConfigStore {
  private readonly filePath: string;

  private constructor(filePath: string, snapshot: ConfigSnapshot, defaults: ConfigSnapshot) {
    super(snapshot, defaults);
    this.filePath = filePath;
  }

  static async open(dataDir: string, env: Env): Promise<JsonFileConfigStore> {
    await mkdir(dataDir, { recursive: true });
    const filePath = join(dataDir, CONFIG_FILE_NAME);
    const defaults = defaultSnapshot(env, 'claude');

    const existing = await readConfigFile(filePath);
    if (existing) {
      logger.info({ filePath, providers: Object.keys(existing.providers).length }, 'Loaded provider configuration');
      return new JsonFileConfigStore(filePath, existing, defaults);
    }

    const legacy = await readConfigFile(join(dataDir, LEGACY_CONFIG_FILE_NAME));
    const store = new JsonFileConfigStore(filePath, legacy ?? defaultSnapshot(env), defaults);
    await store.persist(store.snapshot);

    logger.info(
      { filePath, source: legacy ? LEGACY_CONFIG_FILE_NAME : 'environment' },
      'Initialized provider configuration'
    );
    return store;
  }

  protected override async persist(snapshot: ConfigSnapshot): Promise<void> {
    const contents = `${JSON.stringify(toStored(snapshot), null, 2)}\n`;
    const tempPath = `${this.filePath}.tmp`;

    try {
      await writeFile(tempPath, contents, 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      logger.error({ filePath: this.filePath, error: error instanceof Error ? error.message : String(error) }, 'Failed to write provider configuration');
      throw error;
    }
  }
}
