import { GatewayError, errorMessage } from '../errors.js';
import { logger } from '../middleware/logger.js';
import { trackProviderCall, trackTokens } from '../middleware/metrics.js';
import type { ChatRequest, ChatResponse, LLMProvider, ProviderResult } from '../providers/index.js';
import type { ConfigStore } from '../config/types.js';
import type { ProviderRegistry } from './provider-registry.js';

export type ChatOutcome =
  | { success: true; providerId: string; data: ChatResponse }
  | { success: false; providerId: string; error: GatewayError };

export class ChatOrchestrator {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly store: ConfigStore
  ) {}

  async run(request: ChatRequest): Promise<ChatOutcome> {
    const providerId = request.providerId ?? (await this.store.getDefaultProviderId());

    const resolved = await this.registry.resolve(providerId);
    if (!resolved.success) {
      logger.warn({ provider: providerId, kind: resolved.error.kind }, resolved.error.message);
      return { success: false, providerId, error: resolved.error };
    }

    const { adapter } = resolved.provider;
    const startTime = Date.now();
    const result = await this.invoke(adapter, request);
    const durationSeconds = (Date.now() - startTime) / 1000;

    if (!result.success) {
      trackProviderCall(providerId, adapter.model, 'error', durationSeconds);
      const error = new GatewayError(result.error.kind, `${providerId} (${adapter.model}): ${result.error.message}`, {
        status: result.error.status,
        provider: providerId,
        model: adapter.model,
        cause: result.error,
      });
      logger.warn({ provider: providerId, model: adapter.model, kind: error.kind, durationSeconds }, error.message);
      return { success: false, providerId, error };
    }

    trackProviderCall(providerId, adapter.model, 'success', durationSeconds);
    trackTokens(providerId, adapter.model, result.data.usage.inputTokens, result.data.usage.outputTokens);
    logger.info(
      {
        provider: providerId,
        model: result.data.model,
        inputTokens: result.data.usage.inputTokens,
        outputTokens: result.data.usage.outputTokens,
        durationSeconds,
      },
      'Chat completion success'
    );
    return { success: true, providerId, data: result.data };
  }

  private async invoke(adapter: LLMProvider, request: ChatRequest): Promise<ProviderResult> {
    try {
      return await adapter.chat(request);
    } catch (error) {
      return {
        success: false,
        error: new GatewayError('internal', `${adapter.name} adapter failed: ${errorMessage(error)}`, { cause: error }),
      };
    }
  }
}
