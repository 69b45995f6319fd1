import type { ConfigStore } from '../config/types.js';
import type { AdapterFactories, ChatRequest, ProviderOptions } from '../providers/index.js';
import { defaultAdapterFactories } from '../providers/index.js';
import { BatchProbe } from './batch-probe.js';
import type { BatchProbeInput, BatchProbeOutcome } from './batch-probe.js';
import { ChatOrchestrator } from './chat-orchestrator.js';
import type { ChatOutcome } from './chat-orchestrator.js';
import { ProviderRegistry } from './provider-registry.js';

export interface ProviderSummary {
  id: string;
  name: string;
  model: string;
  enabled: boolean;
  hasApiKey: boolean;
  isDefault: boolean;
}

export interface LLMServiceOptions {
  adapterFactories?: AdapterFactories;
  adapterOptions?: ProviderOptions;
}

export class LLMService {
  private readonly orchestrator: ChatOrchestrator;
  private readonly batch: BatchProbe;

  constructor(private readonly store: ConfigStore, options: LLMServiceOptions = {}) {
    const registry = new ProviderRegistry(
      store,
      options.adapterFactories ?? defaultAdapterFactories,
      options.adapterOptions
    );
    this.orchestrator = new ChatOrchestrator(registry, store);
    this.batch = new BatchProbe(this.orchestrator);
  }

  chat(request: ChatRequest): Promise<ChatOutcome> {
    return this.orchestrator.run(request);
  }

  async listProviders(): Promise<{ providers: ProviderSummary[]; defaultProvider: string }> {
    const [descriptors, defaultProvider] = await Promise.all([
      this.store.listDescriptors(),
      this.store.getDefaultProviderId(),
    ]);

    const providers = Object.values(descriptors).map((descriptor): ProviderSummary => ({
      id: descriptor.id,
      name: descriptor.displayName,
      model: descriptor.model,
      enabled: descriptor.enabled,
      hasApiKey: descriptor.apiKey.length > 0,
      isDefault: descriptor.id === defaultProvider,
    }));

    return { providers, defaultProvider };
  }

  batchProbe(input: BatchProbeInput): Promise<BatchProbeOutcome[]> {
    return this.batch.run(input);
  }
}
