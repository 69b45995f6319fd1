import type { AdapterKind } from '../providers/base.js';

export interface ProviderDescriptor {
  id: string;
  displayName: string;
  apiKey: string;
  model: string;
  baseUrl: string;
  enabled: boolean;
  /** Needed only for providers whose id is not one of the built-ins. */
  adapter?: AdapterKind;
}

export type DescriptorUpdate = Partial<Pick<ProviderDescriptor, 'apiKey' | 'model' | 'enabled'>>;

export interface ConfigSnapshot {
  providers: Record<string, ProviderDescriptor>;
  defaultProvider: string;
}

/**
 * Persisted provider settings. Reads are safe to race; implementations serialize
 * their own writes.
 */
export interface ConfigStore {
  getDescriptor(id: string): Promise<ProviderDescriptor | undefined>;
  getDefaultProviderId(): Promise<string>;
  listDescriptors(): Promise<Record<string, ProviderDescriptor>>;
  updateDescriptor(id: string, updates: DescriptorUpdate): Promise<ProviderDescriptor>;
  addDescriptor(descriptor: ProviderDescriptor): Promise<ProviderDescriptor>;
  setDefaultProvider(id: string): Promise<void>;
  reset(): Promise<void>;
}
