import { ClaudeProvider } from './claude.js';
import { ChatGPTProvider } from './chatgpt.js';
import { GeminiProvider } from './gemini.js';
import { MoonshotProvider } from './moonshot.js';
import { PerplexityProvider } from './perplexity.js';
import type { AdapterFactories, AdapterKind } from './base.js';

export { ClaudeProvider, ChatGPTProvider, GeminiProvider, MoonshotProvider, PerplexityProvider };
export type {
  AdapterFactories,
  AdapterFactory,
  AdapterKind,
  ChatRequest,
  ChatResponse,
  LLMProvider,
  Message,
  ProviderCredentials,
  ProviderOptions,
  ProviderResult,
  Usage,
} from './base.js';
export { ADAPTER_KINDS, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from './base.js';

export const defaultAdapterFactories: AdapterFactories = {
  claude: (credentials, options) => new ClaudeProvider(credentials, options),
  chatgpt: (credentials, options) => new ChatGPTProvider(credentials, options),
  gemini: (credentials, options) => new GeminiProvider(credentials, options),
  moonshot: (credentials, options) => new MoonshotProvider(credentials, options),
  perplexity: (credentials, options) => new PerplexityProvider(credentials, options),
};

/** Adapter used for each built-in provider id. */
export const BUILTIN_ADAPTERS: Readonly<Record<string, AdapterKind>> = {
  claude: 'claude',
  openai: 'chatgpt',
  'gemini-pro': 'gemini',
  'gemini-flash': 'gemini',
  moonshot: 'moonshot',
  perplexity: 'perplexity',
};
