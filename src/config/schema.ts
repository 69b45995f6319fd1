import { z } from 'zod';
import { ADAPTER_KINDS } from '../providers/base.js';
import type { ConfigSnapshot, ProviderDescriptor } from './types.js';

// On-disk layout, shared with the legacy ai-config.json.
export const storedProviderSchema = z.object({
  name: z.string(),
  api_key: z.string().default(''),
  model: z.string(),
  base_url: z.string(),
  enabled: z.boolean().default(true),
  adapter: z.enum(ADAPTER_KINDS).optional(),
});

export const storedConfigSchema = z.object({
  providers: z.record(z.string(), storedProviderSchema),
  default_provider: z.string().default('claude'),
});

export type StoredConfig = z.infer<typeof storedConfigSchema>;

export function fromStored(stored: StoredConfig): ConfigSnapshot {
  const providers: Record<string, ProviderDescriptor> = {};
  for (const [id, entry] of Object.entries(stored.providers)) {
    providers[id] = {
      id,
      displayName: entry.name,
      apiKey: entry.api_key,
      model: entry.model,
      baseUrl: entry.base_url,
      enabled: entry.enabled,
      ...(entry.adapter ? { adapter: entry.adapter } : {}),
    };
  }
  return { providers, defaultProvider: stored.default_provider };
}

export function toStored(snapshot: ConfigSnapshot): StoredConfig {
  const providers: StoredConfig['providers'] = {};
  for (const [id, descriptor] of Object.entries(snapshot.providers)) {
    providers[id] = {
      name: descriptor.displayName,
      api_key: descriptor.apiKey,
      model: descriptor.model,
      base_url: descriptor.baseUrl,
      enabled: descriptor.enabled,
      ...(descriptor.adapter ? { adapter: descriptor.adapter } : {}),
    };
  }
  return { providers, default_provider: snapshot.defaultProvider };
}
