import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../middleware/logger.js';
import { upstreamConnection, upstreamProtocol, upstreamStatus, upstreamTimeout } from '../errors.js';
import type { GatewayError } from '../errors.js';
import type { ChatRequest, LLMProvider, ProviderCredentials, ProviderOptions, ProviderResult } from './base.js';

const LABEL = 'Claude';
const DEFAULT_TIMEOUT_MS = 300_000;

/**
 * The SDK appends `/v1/messages` itself, so a configured `https://api.anthropic.com/v1`
 * loses its version suffix.
 */
export function toAnthropicBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '').replace(/\/v1$/, '');
}

export class ClaudeProvider implements LLMProvider {
  readonly name = 'claude';
  readonly model: string;
  private client: Anthropic;
  private timeoutMs: number;

  constructor(credentials: ProviderCredentials, options: ProviderOptions = {}) {
    this.model = credentials.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new Anthropic({
      apiKey: credentials.apiKey,
      baseURL: credentials.baseUrl ? toAnthropicBaseUrl(credentials.baseUrl) : undefined,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  async chat(request: ChatRequest): Promise<ProviderResult> {
    logger.debug({ provider: this.name, model: this.model, messages: request.messages.length }, 'Calling Claude');

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: request.messages,
        ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
      });

      const first = response.content[0];
      if (!first || first.type !== 'text') {
        return {
          success: false,
          error: upstreamProtocol(LABEL, `first content block is ${first ? first.type : 'missing'}`),
        };
      }

      return {
        success: true,
        data: {
          content: first.text,
          model: response.model,
          provider: this.name,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          },
          ...(response.stop_reason ? { finishReason: response.stop_reason } : {}),
        },
      };
    } catch (error) {
      return { success: false, error: this.toGatewayError(error) };
    }
  }

  private toGatewayError(error: unknown): GatewayError {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return upstreamTimeout(LABEL, this.timeoutMs, error);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return upstreamConnection(LABEL, error.cause ?? error);
    }
    if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
      return upstreamStatus(LABEL, error.status, error.error ?? error.message, error);
    }
    return upstreamProtocol(LABEL, error instanceof Error ? error.message : String(error));
  }
}
