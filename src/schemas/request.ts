import { z } from 'zod';
import { ADAPTER_KINDS, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../providers/base.js';
import type { ChatRequest, ChatResponse } from '../providers/base.js';
import type { BatchProbeOutcome } from '../services/batch-probe.js';
import type { DescriptorUpdate, ProviderDescriptor } from '../config/types.js';

export const MessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export const ChatCompletionRequestSchema = z
  .object({
    provider: z.string().nullish(),
    messages: z.array(MessageSchema).min(1),
    system_prompt: z.string().nullish(),
    max_tokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
    temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  })
  .transform(
    (body): ChatRequest => ({
      ...(body.provider ? { providerId: body.provider } : {}),
      messages: body.messages,
      ...(body.system_prompt ? { systemPrompt: body.system_prompt } : {}),
      maxTokens: body.max_tokens,
      temperature: body.temperature,
    })
  );

export const BatchProbeRequestSchema = z.object({
  providers: z.array(z.string().min(1)).min(1),
  message: z.string().min(1).default('Hello! Please respond with a short greeting.'),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

// null means "leave unchanged"; an empty api_key clears the key.
export const ProviderUpdateSchema = z
  .object({
    api_key: z.string().nullish(),
    model: z.string().nullish(),
    enabled: z.boolean().nullish(),
  })
  .transform(
    (body): DescriptorUpdate => ({
      ...(typeof body.api_key === 'string' ? { apiKey: body.api_key } : {}),
      ...(body.model ? { model: body.model } : {}),
      ...(typeof body.enabled === 'boolean' ? { enabled: body.enabled } : {}),
    })
  );

export const ProviderCreateSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'Provider id must be lowercase letters, digits and dashes'),
  name: z.string().min(1),
  api_key: z.string().default(''),
  model: z.string().min(1),
  base_url: z.string().url(),
  enabled: z.boolean().default(true),
  adapter: z.enum(ADAPTER_KINDS),
});

export const DefaultProviderSchema = z.object({
  provider: z.string().min(1),
});

export function toChatResponseBody(response: ChatResponse) {
  return {
    content: response.content,
    model: response.model,
    provider: response.provider,
    usage: {
      input_tokens: response.usage.inputTokens,
      output_tokens: response.usage.outputTokens,
    },
    ...(response.citations ? { citations: response.citations } : {}),
    ...(response.finishReason ? { finish_reason: response.finishReason } : {}),
  };
}

export function toBatchProbeBody(outcome: BatchProbeOutcome) {
  if (outcome.success) {
    return {
      provider: outcome.provider,
      success: true,
      response: outcome.response,
      model: outcome.model,
      elapsed_ms: outcome.elapsedMs,
    };
  }
  return {
    provider: outcome.provider,
    success: false,
    error: outcome.error,
    elapsed_ms: outcome.elapsedMs,
  };
}

export function toDescriptor(body: z.infer<typeof ProviderCreateSchema>): ProviderDescriptor {
  return {
    id: body.id,
    displayName: body.name,
    apiKey: body.api_key,
    model: body.model,
    baseUrl: body.base_url,
    enabled: body.enabled,
    adapter: body.adapter,
  };
}
