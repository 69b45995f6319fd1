import type { FastifyInstance } from 'fastify';
import { GatewayError } from '../errors.js';
import type { ConfigStore, ProviderDescriptor } from '../config/types.js';
import { DefaultProviderSchema, ProviderCreateSchema, ProviderUpdateSchema, toDescriptor } from '../schemas/request.js';
import { maskApiKey } from '../utils/mask.js';
import { logger } from '../middleware/logger.js';

function toMaskedBody(descriptor: ProviderDescriptor) {
  return {
    id: descriptor.id,
    name: descriptor.displayName,
    api_key: maskApiKey(descriptor.apiKey),
    model: descriptor.model,
    base_url: descriptor.baseUrl,
    enabled: descriptor.enabled,
    ...(descriptor.adapter ? { adapter: descriptor.adapter } : {}),
  };
}

export async function settingsRoutes(fastify: FastifyInstance, store: ConfigStore): Promise<void> {
  fastify.get('/api/settings/providers', async () => {
    const [descriptors, defaultProvider] = await Promise.all([store.listDescriptors(), store.getDefaultProviderId()]);

    const providers: Record<string, ReturnType<typeof toMaskedBody>> = {};
    for (const [id, descriptor] of Object.entries(descriptors)) {
      providers[id] = toMaskedBody(descriptor);
    }
    return { providers, default_provider: defaultProvider };
  });

  fastify.get<{ Params: { id: string } }>('/api/settings/provider/:id', async (request) => {
    const descriptor = await store.getDescriptor(request.params.id);
    if (!descriptor) {
      throw new GatewayError('not_found', `Provider not found: ${request.params.id}`);
    }
    return toMaskedBody(descriptor);
  });

  fastify.put<{ Params: { id: string } }>('/api/settings/provider/:id', async (request, reply) => {
    const updates = ProviderUpdateSchema.parse(request.body ?? {});
    if (Object.keys(updates).length === 0) {
      return reply.code(400).send({ error: 'Validation error', message: 'No updates provided' });
    }

    const updated = await store.updateDescriptor(request.params.id, updates);
    logger.info({ requestId: request.id, provider: updated.id, fields: Object.keys(updates) }, 'Provider updated');

    return { success: true, provider: toMaskedBody(updated) };
  });

  fastify.post('/api/settings/providers', async (request, reply) => {
    const body = ProviderCreateSchema.parse(request.body);
    const created = await store.addDescriptor(toDescriptor(body));
    logger.info({ requestId: request.id, provider: created.id, adapter: created.adapter }, 'Provider added');

    return reply.code(201).send({ success: true, provider: toMaskedBody(created) });
  });

  fastify.put('/api/settings/default-provider', async (request) => {
    const body = DefaultProviderSchema.parse(request.body);
    await store.setDefaultProvider(body.provider);
    logger.info({ requestId: request.id, provider: body.provider }, 'Default provider changed');

    return { success: true, default_provider: body.provider };
  });

  fastify.post('/api/settings/reset', async (request) => {
    await store.reset();
    logger.info({ requestId: request.id }, 'Provider configuration reset');

    return { success: true, default_provider: await store.getDefaultProviderId() };
  });
}
