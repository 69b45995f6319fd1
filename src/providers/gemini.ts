import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  HarmBlockThreshold,
  HarmCategory,
} from '@google/generative-ai';
import type {
  Content,
  EnhancedGenerateContentResponse,
  GenerativeModel,
  SafetySetting,
} from '@google/generative-ai';
import { logger } from '../middleware/logger.js';
import { upstreamConnection, upstreamProtocol, upstreamStatus, upstreamTimeout } from '../errors.js';
import type { GatewayError } from '../errors.js';
import type { ChatRequest, LLMProvider, ProviderCredentials, ProviderOptions, ProviderResult } from './base.js';

const LABEL = 'Gemini';
const DEFAULT_TIMEOUT_MS = 300_000;

const SAFETY_SETTINGS: SafetySetting[] = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

const TIMEOUT_PATTERN = /timed? ?out|aborted/i;

/**
 * Splits `https://host/v1beta` into the SDK's separate base URL and API version.
 */
export function splitBaseUrl(baseUrl: string): { baseUrl?: string; apiVersion?: string } {
  const trimmed = baseUrl.replace(/\/+$/, '');
  if (!trimmed) return {};
  const match = /^(.*)\/(v\d+(?:alpha|beta)?\d*)$/.exec(trimmed);
  if (!match) return { baseUrl: trimmed };
  return { baseUrl: match[1], apiVersion: match[2] };
}

/**
 * Gemini has no native system field here and rejects adjacent turns with the same
 * role, so the system prompt becomes a leading user turn and same-role neighbours
 * are merged.
 */
export function buildContents(request: ChatRequest): Content[] {
  const turns: Array<{ role: 'user' | 'model'; text: string }> = [];

  if (request.systemPrompt) {
    turns.push({ role: 'user', text: `[System Instruction]\n${request.systemPrompt}\n\n[User Message]` });
  }

  for (const message of request.messages) {
    if (!message.content) continue;

    const role = message.role === 'assistant' ? 'model' : 'user';
    const previous = turns[turns.length - 1];
    if (previous && previous.role === role) {
      previous.text += `\n\n${message.content}`;
    } else {
      turns.push({ role, text: message.content });
    }
  }

  return turns.map((turn) => ({ role: turn.role, parts: [{ text: turn.text }] }));
}

/**
 * Never throws: a response without usable text becomes a bracketed placeholder.
 */
export function extractText(response: EnhancedGenerateContentResponse): string {
  let text = '';
  try {
    text = response.text();
  } catch (error) {
    logger.warn({ provider: 'gemini', error: error instanceof Error ? error.message : String(error) }, 'Gemini text accessor failed');
  }
  if (text) return text;

  const candidate = response.candidates?.[0];
  if (!candidate) return '[No content returned]';

  const parts = (candidate.content?.parts ?? [])
    .map((part) => part.text)
    .filter((partText): partText is string => Boolean(partText));
  if (parts.length > 0) return parts.join('\n');

  return `[Empty response: ${candidate.finishReason ?? 'UNKNOWN'}]`;
}

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini';
  readonly model: string;
  private client: GoogleGenerativeAI;
  private timeoutMs: number;
  private baseUrl: string;

  constructor(credentials: ProviderCredentials, options: ProviderOptions = {}) {
    this.model = credentials.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = credentials.baseUrl;
    this.client = new GoogleGenerativeAI(credentials.apiKey);
  }

  private getModel(request: ChatRequest): GenerativeModel {
    return this.client.getGenerativeModel(
      {
        model: this.model,
        safetySettings: SAFETY_SETTINGS,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
        },
      },
      { timeout: this.timeoutMs, ...splitBaseUrl(this.baseUrl) }
    );
  }

  async chat(request: ChatRequest): Promise<ProviderResult> {
    const contents = buildContents(request);
    logger.debug({ provider: this.name, model: this.model, turns: contents.length }, 'Calling Gemini');

    let response: EnhancedGenerateContentResponse;
    try {
      const result = await this.getModel(request).generateContent({ contents });
      response = result.response;
    } catch (error) {
      return { success: false, error: this.toGatewayError(error) };
    }

    const candidate = response.candidates?.[0];
    return {
      success: true,
      data: {
        content: extractText(response),
        model: this.model,
        provider: this.name,
        usage: {
          inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
          outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
        },
        finishReason: candidate?.finishReason ?? 'UNKNOWN',
      },
    };
  }

  private toGatewayError(error: unknown): GatewayError {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof GoogleGenerativeAIFetchError && error.status === 504) {
      return upstreamTimeout(LABEL, this.timeoutMs, error);
    }
    if (TIMEOUT_PATTERN.test(message)) {
      return upstreamTimeout(LABEL, this.timeoutMs, error);
    }
    if (error instanceof GoogleGenerativeAIFetchError && typeof error.status === 'number') {
      return upstreamStatus(LABEL, error.status, message, error);
    }
    if (error instanceof GoogleGenerativeAIError) {
      return upstreamConnection(LABEL, error);
    }
    return upstreamProtocol(LABEL, message);
  }
}
