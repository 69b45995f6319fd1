import type { GatewayError } from '../errors.js';

export const ADAPTER_KINDS = ['claude', 'chatgpt', 'gemini', 'moonshot', 'perplexity'] as const;

export type AdapterKind = (typeof ADAPTER_KINDS)[number];

export interface Message {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatRequest {
  providerId?: string;
  messages: Message[];
  systemPrompt?: string;
  maxTokens: number;
  temperature: number;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  content: string;
  model: string;
  provider: AdapterKind;
  usage: Usage;
  citations?: string[];
  finishReason?: string;
}

export type ProviderResult =
  | { success: true; data: ChatResponse }
  | { success: false; error: GatewayError };

export interface ProviderCredentials {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export interface ProviderOptions {
  /** Upstream request budget; each adapter has its own default. */
  timeoutMs?: number;
}

export interface LLMProvider {
  readonly name: AdapterKind;
  readonly model: string;
  chat(request: ChatRequest): Promise<ProviderResult>;
}

export type AdapterFactory = (credentials: ProviderCredentials, options?: ProviderOptions) => LLMProvider;

export type AdapterFactories = Record<AdapterKind, AdapterFactory>;

export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TEMPERATURE = 0.7;
