import OpenAI from 'openai';
import { logger } from '../middleware/logger.js';
import { upstreamConnection, upstreamProtocol, upstreamStatus, upstreamTimeout } from '../errors.js';
import type { GatewayError } from '../errors.js';
import type {
  AdapterKind,
  ChatRequest,
  LLMProvider,
  ProviderCredentials,
  ProviderOptions,
  ProviderResult,
} from './base.js';

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Chat-completions adapter for any endpoint that speaks the OpenAI wire format.
 * The system prompt travels as a leading `system` message.
 */
export abstract class OpenAICompatibleProvider implements LLMProvider {
  abstract readonly name: AdapterKind;
  protected abstract readonly label: string;
  readonly model: string;
  protected client: OpenAI;
  protected timeoutMs: number;

  constructor(credentials: ProviderCredentials, options: ProviderOptions = {}) {
    this.model = credentials.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: credentials.apiKey,
      baseURL: credentials.baseUrl ? credentials.baseUrl.replace(/\/+$/, '') : undefined,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  protected buildMessages(request: ChatRequest): OpenAI.Chat.ChatCompletionMessageParam[] {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    for (const message of request.messages) {
      messages.push({ role: message.role, content: message.content });
    }
    return messages;
  }

  protected buildParams(request: ChatRequest): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
    return {
      model: this.model,
      messages: this.buildMessages(request),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };
  }

  protected extractCitations(_response: OpenAI.Chat.ChatCompletion): string[] | undefined {
    return undefined;
  }

  async chat(request: ChatRequest): Promise<ProviderResult> {
    logger.debug({ provider: this.name, model: this.model, messages: request.messages.length }, `Calling ${this.label}`);

    try {
      const response = await this.client.chat.completions.create(this.buildParams(request));
      const choice = response.choices[0];
      if (!choice) {
        return { success: false, error: upstreamProtocol(this.label, 'no choices in response') };
      }

      const citations = this.extractCitations(response);
      return {
        success: true,
        data: {
          content: choice.message?.content ?? '',
          model: response.model,
          provider: this.name,
          usage: {
            inputTokens: response.usage?.prompt_tokens ?? 0,
            outputTokens: response.usage?.completion_tokens ?? 0,
          },
          ...(citations ? { citations } : {}),
          ...(choice.finish_reason ? { finishReason: choice.finish_reason } : {}),
        },
      };
    } catch (error) {
      return { success: false, error: this.toGatewayError(error) };
    }
  }

  private toGatewayError(error: unknown): GatewayError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return upstreamTimeout(this.label, this.timeoutMs, error);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return upstreamConnection(this.label, error.cause ?? error);
    }
    if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
      return upstreamStatus(this.label, error.status, error.error ?? error.message, error);
    }
    return upstreamProtocol(this.label, error instanceof Error ? error.message : String(error));
  }
}
