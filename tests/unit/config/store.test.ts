import { describe, it, expect } from 'vitest';
import { GatewayError } from '../../../src/errors.js';
import { InMemoryConfigStore } from '../../../src/config/store.js';
import type { ConfigSnapshot } from '../../../src/config/types.js';
import { createStore, descriptor } from '../../helpers/fakes.js';

class FailingStore extends InMemoryConfigStore {
  written: ConfigSnapshot[] = [];
  failNext = false;

  protected override async persist(snapshot: ConfigSnapshot): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    this.written.push(structuredClone(snapshot));
  }
}

describe('InMemoryConfigStore', () => {
  it('returns copies that callers cannot mutate', async () => {
    const store = createStore([descriptor('claude')]);

    const copy = await store.getDescriptor('claude');
    if (copy) copy.model = 'changed';
    const listed = await store.listDescriptors();
    listed.claude.enabled = false;

    expect(await store.getDescriptor('claude')).toEqual(descriptor('claude'));
  });

  it('applies only the fields given in an update', async () => {
    const store = createStore([descriptor('claude')]);

    const updated = await store.updateDescriptor('claude', { model: 'claude-next', apiKey: undefined });

    expect(updated).toEqual(descriptor('claude', { model: 'claude-next' }));
    expect(await store.getDescriptor('claude')).toEqual(updated);
  });

  it('allows clearing an api key', async () => {
    const store = createStore([descriptor('claude')]);

    const updated = await store.updateDescriptor('claude', { apiKey: '' });

    expect(updated.apiKey).toBe('');
  });

  it('rejects updates to unknown providers', async () => {
    const store = createStore([descriptor('claude')]);

    await expect(store.updateDescriptor('nope', { enabled: false })).rejects.toMatchObject({
      kind: 'not_found',
      message: 'Provider not found: nope',
    });
  });

  it('adds new providers and refuses duplicates', async () => {
    const store = createStore([descriptor('claude')]);

    await store.addDescriptor(descriptor('local', { adapter: 'moonshot' }));

    expect(await store.getDescriptor('local')).toEqual(descriptor('local', { adapter: 'moonshot' }));
    const duplicate = store.addDescriptor(descriptor('claude'));
    await expect(duplicate).rejects.toBeInstanceOf(GatewayError);
    await expect(duplicate).rejects.toMatchObject({ kind: 'conflict', message: 'Provider already exists: claude' });
  });

  it('only accepts known ids as the default provider', async () => {
    const store = createStore([descriptor('claude'), descriptor('openai')]);

    await store.setDefaultProvider('openai');

    expect(await store.getDefaultProviderId()).toBe('openai');
    await expect(store.setDefaultProvider('nope')).rejects.toMatchObject({ kind: 'not_found' });
    expect(await store.getDefaultProviderId()).toBe('openai');
  });

  it('restores its defaults on reset', async () => {
    const defaults = { providers: { claude: descriptor('claude') }, defaultProvider: 'claude' };
    const store = new InMemoryConfigStore(
      { providers: { claude: descriptor('claude', { apiKey: 'other-key' }) }, defaultProvider: 'claude' },
      defaults
    );
    await store.addDescriptor(descriptor('local', { adapter: 'chatgpt' }));

    await store.reset();

    expect(await store.listDescriptors()).toEqual(defaults.providers);
  });

  it('applies a change only after it has been persisted', async () => {
    const store = new FailingStore({ providers: { claude: descriptor('claude') }, defaultProvider: 'claude' });
    store.failNext = true;

    await expect(store.updateDescriptor('claude', { model: 'claude-next' })).rejects.toThrow('disk full');
    expect(await store.getDescriptor('claude')).toEqual(descriptor('claude'));

    await store.updateDescriptor('claude', { enabled: false });
    expect(store.written).toEqual([
      { providers: { claude: descriptor('claude', { enabled: false }) }, defaultProvider: 'claude' },
    ]);
  });

  it('applies concurrent updates one after another', async () => {
    const store = createStore([descriptor('claude')]);

    await Promise.all([
      store.updateDescriptor('claude', { model: 'claude-next' }),
      store.updateDescriptor('claude', { enabled: false }),
    ]);

    expect(await store.getDescriptor('claude')).toEqual(descriptor('claude', { model: 'claude-next', enabled: false }));
  });
});
