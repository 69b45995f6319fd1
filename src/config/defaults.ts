import type { Env } from './env.js';
import type { ConfigSnapshot, ProviderDescriptor } from './types.js';

export function defaultProviders(env: Env): ProviderDescriptor[] {
  return [
    {
      id: 'claude',
      displayName: 'Claude (Anthropic)',
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.CLAUDE_MODEL,
      baseUrl: 'https://api.anthropic.com/v1',
      enabled: true,
    },
    {
      id: 'openai',
      displayName: 'GPT (OpenAI)',
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      baseUrl: 'https://api.openai.com/v1',
      enabled: true,
    },
    {
      id: 'gemini-pro',
      displayName: 'Gemini (Pro)',
      apiKey: env.GOOGLE_API_KEY,
      model: env.GEMINI_PRO_MODEL,
      baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
      enabled: true,
    },
    {
      id: 'gemini-flash',
      displayName: 'Gemini (Flash)',
      apiKey: env.GOOGLE_API_KEY,
      model: env.GEMINI_FLASH_MODEL,
      baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
      enabled: true,
    },
    {
      id: 'moonshot',
      displayName: 'Moonshot (Kimi)',
      apiKey: env.MOONSHOT_API_KEY,
      model: env.MOONSHOT_MODEL,
      baseUrl: 'https://api.moonshot.ai/v1',
      enabled: true,
    },
    {
      id: 'perplexity',
      displayName: 'Perplexity',
      apiKey: env.PERPLEXITY_API_KEY,
      model: env.PERPLEXITY_MODEL,
      baseUrl: 'https://api.perplexity.ai',
      enabled: true,
    },
  ];
}

export function defaultSnapshot(env: Env, defaultProvider: string = env.DEFAULT_AI_PROVIDER): ConfigSnapshot {
  return {
    providers: Object.fromEntries(defaultProviders(env).map((descriptor) => [descriptor.id, descriptor])),
    defaultProvider,
  };
}
