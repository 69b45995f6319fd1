import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadEnv } from '../../../src/config/env.js';
import { CONFIG_FILE_NAME, JsonFileConfigStore, LEGACY_CONFIG_FILE_NAME } from '../../../src/config/json-store.js';

const env = loadEnv({ ANTHROPIC_API_KEY: 'test-key', DEFAULT_AI_PROVIDER: 'openai' });

async function readStored(dataDir: string): Promise<unknown> {
  return JSON.parse(await readFile(join(dataDir, CONFIG_FILE_NAME), 'utf8'));
}

describe('JsonFileConfigStore', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'ai-gateway-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('seeds the file from the environment on first start', async () => {
    const store = await JsonFileConfigStore.open(dataDir, env);

    expect(await store.getDefaultProviderId()).toBe('openai');
    expect(Object.keys(await store.listDescriptors())).toEqual([
      'claude',
      'openai',
      'gemini-pro',
      'gemini-flash',
      'moonshot',
      'perplexity',
    ]);
    expect(await readStored(dataDir)).toMatchObject({
      default_provider: 'openai',
      providers: {
        claude: {
          name: 'Claude (Anthropic)',
          api_key: 'test-key',
          model: 'claude-sonnet-4-20250514',
          base_url: 'https://api.anthropic.com/v1',
          enabled: true,
        },
      },
    });
  });

  it('migrates the legacy file when no config file exists', async () => {
    await writeFile(
      join(dataDir, LEGACY_CONFIG_FILE_NAME),
      JSON.stringify({
        providers: {
          claude: { name: 'Claude', api_key: 'legacy-key', model: 'claude-old', base_url: 'https://api.anthropic.com/v1' },
        },
        default_provider: 'claude',
      })
    );

    const store = await JsonFileConfigStore.open(dataDir, env);

    expect(await store.getDescriptor('claude')).toEqual({
      id: 'claude',
      displayName: 'Claude',
      apiKey: 'legacy-key',
      model: 'claude-old',
      baseUrl: 'https://api.anthropic.com/v1',
      enabled: true,
    });
    expect(await readStored(dataDir)).toEqual({
      providers: {
        claude: {
          name: 'Claude',
          api_key: 'legacy-key',
          model: 'claude-old',
          base_url: 'https://api.anthropic.com/v1',
          enabled: true,
        },
      },
      default_provider: 'claude',
    });
  });

  it('keeps changes across reopening', async () => {
    const first = await JsonFileConfigStore.open(dataDir, env);
    await first.updateDescriptor('moonshot', { apiKey: 'new-key', enabled: false });
    await first.setDefaultProvider('moonshot');

    const second = await JsonFileConfigStore.open(dataDir, loadEnv({}));

    expect(await second.getDefaultProviderId()).toBe('moonshot');
    expect(await second.getDescriptor('moonshot')).toMatchObject({ apiKey: 'new-key', enabled: false });
  });

  it('resets to environment defaults with claude as the default provider', async () => {
    const store = await JsonFileConfigStore.open(dataDir, env);
    await store.updateDescriptor('claude', { model: 'claude-other' });

    await store.reset();

    expect(await store.getDefaultProviderId()).toBe('claude');
    expect(await store.getDescriptor('claude')).toMatchObject({ model: 'claude-sonnet-4-20250514' });
    expect(await readStored(dataDir)).toMatchObject({ default_provider: 'claude' });
  });

  it('keeps the previous state when the file cannot be written', async () => {
    const store = await JsonFileConfigStore.open(dataDir, env);
    await mkdir(join(dataDir, `${CONFIG_FILE_NAME}.tmp`));

    await expect(store.updateDescriptor('claude', { apiKey: 'new-key' })).rejects.toThrow();
    await expect(store.setDefaultProvider('moonshot')).rejects.toThrow();

    expect(await store.getDescriptor('claude')).toMatchObject({ apiKey: 'test-key' });
    expect(await store.getDefaultProviderId()).toBe('openai');
    expect(await readStored(dataDir)).toMatchObject({
      default_provider: 'openai',
      providers: { claude: { api_key: 'test-key' } },
    });
  });
});
