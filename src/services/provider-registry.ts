import { GatewayError } from '../errors.js';
import { BUILTIN_ADAPTERS, defaultAdapterFactories } from '../providers/index.js';
import type { AdapterFactories, AdapterKind, LLMProvider, ProviderOptions } from '../providers/index.js';
import type { ConfigStore, ProviderDescriptor } from '../config/types.js';

export interface ResolvedProvider {
  descriptor: ProviderDescriptor;
  adapter: LLMProvider;
}

export type ResolveResult =
  | { success: true; provider: ResolvedProvider }
  | { success: false; error: GatewayError };

export class ProviderRegistry {
  constructor(
    private readonly store: ConfigStore,
    private readonly factories: AdapterFactories = defaultAdapterFactories,
    private readonly adapterOptions: ProviderOptions = {}
  ) {}

  adapterKindFor(descriptor: ProviderDescriptor): AdapterKind | undefined {
    if (descriptor.adapter) return descriptor.adapter;
    return Object.hasOwn(BUILTIN_ADAPTERS, descriptor.id) ? BUILTIN_ADAPTERS[descriptor.id] : undefined;
  }

  /**
   * Checks existence, enablement, credential and adapter availability, in that
   * order, so the reported failure is the first one that applies.
   */
  async resolve(providerId: string): Promise<ResolveResult> {
    const descriptor = await this.store.getDescriptor(providerId);
    if (!descriptor) {
      return { success: false, error: new GatewayError('not_found', `Provider not found: ${providerId}`) };
    }

    if (!descriptor.enabled) {
      return { success: false, error: new GatewayError('disabled', `Provider is disabled: ${providerId}`) };
    }

    if (!descriptor.apiKey) {
      return {
        success: false,
        error: new GatewayError('missing_credential', `API key not configured for: ${providerId}`),
      };
    }

    const kind = this.adapterKindFor(descriptor);
    if (!kind) {
      return { success: false, error: new GatewayError('unsupported_provider', `Unknown provider: ${providerId}`) };
    }

    const adapter = this.factories[kind](
      { apiKey: descriptor.apiKey, model: descriptor.model, baseUrl: descriptor.baseUrl },
      this.adapterOptions
    );
    return { success: true, provider: { descriptor, adapter } };
  }
}
