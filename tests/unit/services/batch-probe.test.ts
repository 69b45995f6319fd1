import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BatchProbe, PROBE_EXCERPT_LENGTH, UNKNOWN_PROVIDER_LABEL } from '../../../src/services/batch-probe.js';
import { register } from '../../../src/middleware/metrics.js';
import { ChatOrchestrator } from '../../../src/services/chat-orchestrator.js';
import { ProviderRegistry } from '../../../src/services/provider-registry.js';
import type { ProviderDescriptor } from '../../../src/config/types.js';
import { createStore, descriptor, fakeFactories, okResult } from '../../helpers/fakes.js';
import type { ChatHandler } from '../../helpers/fakes.js';

function probeWith(descriptors: ProviderDescriptor[], handlers: Parameters<typeof fakeFactories>[0]) {
  const store = createStore(descriptors);
  return new BatchProbe(new ChatOrchestrator(new ProviderRegistry(store, fakeFactories(handlers)), store));
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('BatchProbe', () => {
  beforeEach(() => {
    register.resetMetrics();
  });

  it('returns one outcome per provider in input order', async () => {
    const probe = probeWith([descriptor('claude'), descriptor('openai'), descriptor('moonshot')], {
      claude: async (_request, credentials) => {
        await delay(30);
        return okResult('claude', credentials.model, 'slow');
      },
    });

    const outcomes = await probe.run({ providerIds: ['claude', 'openai', 'moonshot'], message: 'hi' });

    expect(outcomes.map((outcome) => outcome.provider)).toEqual(['claude', 'openai', 'moonshot']);
    expect(outcomes.every((outcome) => outcome.success)).toBe(true);
  });

  it('times each provider separately and isolates failures', async () => {
    const probe = probeWith([descriptor('claude'), descriptor('openai', { apiKey: '' })], {
      claude: async (_request, credentials) => {
        await delay(50);
        return okResult('claude', credentials.model, 'hello');
      },
    });

    const [slow, broken] = await probe.run({ providerIds: ['claude', 'openai'], message: 'hi' });

    expect(slow).toMatchObject({ provider: 'claude', success: true, response: 'hello', model: 'claude-model' });
    expect(slow.elapsedMs).toBeGreaterThanOrEqual(45);

    expect(broken.success).toBe(false);
    if (broken.success) return;
    expect(broken.error).toContain('API key not configured');
    expect(broken.elapsedMs).toBeLessThan(45);
  });

  it('sends a single user message with the probe defaults', async () => {
    const claude = vi.fn<ChatHandler>(async (_request, credentials) => okResult('claude', credentials.model, 'hi'));
    const probe = probeWith([descriptor('claude')], { claude });

    await probe.run({ providerIds: ['claude'], message: 'ping' });

    expect(claude).toHaveBeenCalledWith(
      { providerId: 'claude', messages: [{ role: 'user', content: 'ping' }], maxTokens: 100, temperature: 0.7 },
      expect.anything()
    );
  });

  it('cuts long responses to an excerpt', async () => {
    const probe = probeWith([descriptor('claude')], {
      claude: async (_request, credentials) => okResult('claude', credentials.model, 'y'.repeat(1200)),
    });

    const [outcome] = await probe.run({ providerIds: ['claude'], message: 'hi' });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.response).toBe('y'.repeat(PROBE_EXCERPT_LENGTH));
  });

  it('never splits a character made of a surrogate pair', async () => {
    const probe = probeWith([descriptor('claude')], {
      claude: async (_request, credentials) => okResult('claude', credentials.model, `${'a'.repeat(499)}😀tail`),
    });

    const [outcome] = await probe.run({ providerIds: ['claude'], message: 'hi' });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.response).toBe(`${'a'.repeat(499)}😀`);
  });

  it('counts outcomes for unconfigured ids under one label', async () => {
    const probe = probeWith([descriptor('claude')], {});

    await probe.run({ providerIds: ['claude', 'junk-1', 'junk-2', 'junk-3'], message: 'hi' });

    const metric = register.getSingleMetric('ai_gateway_batch_probe_outcomes_total');
    if (!metric) throw new Error('batch probe counter is not registered');
    const { values } = await metric.get();
    expect(values).toHaveLength(2);
    expect(values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ value: 1, labels: { provider: 'claude', outcome: 'success' } }),
        expect.objectContaining({ value: 3, labels: { provider: UNKNOWN_PROVIDER_LABEL, outcome: 'failure' } }),
      ])
    );
  });

  it('keeps going when an adapter throws', async () => {
    const probe = probeWith([descriptor('claude'), descriptor('openai')], {
      chatgpt: async () => {
        throw new Error('kaboom');
      },
    });

    const [claude, openai] = await probe.run({ providerIds: ['claude', 'openai'], message: 'hi' });

    expect(claude.success).toBe(true);
    expect(openai).toMatchObject({
      provider: 'openai',
      success: false,
      error: 'openai (openai-model): chatgpt adapter failed: kaboom',
    });
  });
});
