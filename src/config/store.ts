import { GatewayError } from '../errors.js';
import type { ConfigSnapshot, ConfigStore, DescriptorUpdate, ProviderDescriptor } from './types.js';

function findDescriptor(snapshot: ConfigSnapshot, id: string): ProviderDescriptor | undefined {
  return Object.hasOwn(snapshot.providers, id) ? snapshot.providers[id] : undefined;
}

export class InMemoryConfigStore implements ConfigStore {
  protected snapshot: ConfigSnapshot;
  private defaults: ConfigSnapshot;
  private mutations: Promise<void> = Promise.resolve();

  constructor(snapshot: ConfigSnapshot, defaults: ConfigSnapshot = snapshot) {
    this.snapshot = structuredClone(snapshot);
    this.defaults = structuredClone(defaults);
  }

  async getDescriptor(id: string): Promise<ProviderDescriptor | undefined> {
    const descriptor = findDescriptor(this.snapshot, id);
    return descriptor ? { ...descriptor } : undefined;
  }

  async getDefaultProviderId(): Promise<string> {
    return this.snapshot.defaultProvider;
  }

  async listDescriptors(): Promise<Record<string, ProviderDescriptor>> {
    return structuredClone(this.snapshot.providers);
  }

  async updateDescriptor(id: string, updates: DescriptorUpdate): Promise<ProviderDescriptor> {
    return this.mutate((draft) => {
      const current = findDescriptor(draft, id);
      if (!current) {
        throw new GatewayError('not_found', `Provider not found: ${id}`);
      }

      const updated: ProviderDescriptor = {
        ...current,
        ...(updates.apiKey !== undefined ? { apiKey: updates.apiKey } : {}),
        ...(updates.model !== undefined ? { model: updates.model } : {}),
        ...(updates.enabled !== undefined ? { enabled: updates.enabled } : {}),
      };
      draft.providers[id] = updated;
      return { ...updated };
    });
  }

  async addDescriptor(descriptor: ProviderDescriptor): Promise<ProviderDescriptor> {
    return this.mutate((draft) => {
      if (findDescriptor(draft, descriptor.id)) {
        throw new GatewayError('conflict', `Provider already exists: ${descriptor.id}`);
      }

      draft.providers[descriptor.id] = { ...descriptor };
      return { ...descriptor };
    });
  }

  async setDefaultProvider(id: string): Promise<void> {
    await this.mutate((draft) => {
      if (!findDescriptor(draft, id)) {
        throw new GatewayError('not_found', `Provider not found: ${id}`);
      }

      draft.defaultProvider = id;
    });
  }

  async reset(): Promise<void> {
    await this.mutate((draft) => {
      const defaults = structuredClone(this.defaults);
      draft.providers = defaults.providers;
      draft.defaultProvider = defaults.defaultProvider;
    });
  }

  /**
   * Applies `change` to a copy of the current snapshot and makes the copy current
   * only once `persist` has accepted it. Mutations run one at a time.
   */
  private mutate<T>(change: (draft: ConfigSnapshot) => T): Promise<T> {
    const run = this.mutations.then(async () => {
      const draft = structuredClone(this.snapshot);
      const result = change(draft);
      await this.persist(draft);
      this.snapshot = draft;
      return result;
    });
    // The caller receives the failure through `run`; the queue only needs to move on.
    this.mutations = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Called with the next snapshot before it replaces the current one. */
  protected async persist(_snapshot: ConfigSnapshot): Promise<void> {}
}
