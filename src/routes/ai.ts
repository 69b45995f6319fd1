import type { FastifyInstance } from 'fastify';
import {
  BatchProbeRequestSchema,
  ChatCompletionRequestSchema,
  toBatchProbeBody,
  toChatResponseBody,
} from '../schemas/request.js';
import type { LLMService } from '../services/llm-service.js';
import { logger } from '../middleware/logger.js';

export async function aiRoutes(fastify: FastifyInstance, llmService: LLMService): Promise<void> {
  fastify.post('/api/ai/chat', async (request, reply) => {
    const body = ChatCompletionRequestSchema.parse(request.body);

    logger.info(
      {
        requestId: request.id,
        provider: body.providerId ?? 'default',
        messageCount: body.messages.length,
        maxTokens: body.maxTokens,
      },
      'Chat request'
    );

    const outcome = await llmService.chat(body);
    if (!outcome.success) {
      throw outcome.error;
    }

    return reply.code(200).send(toChatResponseBody(outcome.data));
  });

  fastify.get('/api/ai/providers', async () => {
    const { providers, defaultProvider } = await llmService.listProviders();
    return {
      providers: providers.map((provider) => ({
        id: provider.id,
        name: provider.name,
        model: provider.model,
        enabled: provider.enabled,
        has_api_key: provider.hasApiKey,
        is_default: provider.isDefault,
      })),
      default: defaultProvider,
    };
  });

  fastify.post('/api/ai/batch-probe', async (request) => {
    const body = BatchProbeRequestSchema.parse(request.body);

    logger.info({ requestId: request.id, providers: body.providers }, 'Batch probe request');

    const outcomes = await llmService.batchProbe({
      providerIds: body.providers,
      message: body.message,
      maxTokens: body.max_tokens,
      temperature: body.temperature,
    });

    return { results: outcomes.map(toBatchProbeBody) };
  });
}
