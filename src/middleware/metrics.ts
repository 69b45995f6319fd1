/**
 * Prometheus metrics for HTTP traffic and upstream provider calls.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';

const register = new client.Registry();

client.collectDefaultMetrics({ register });

const httpRequestDuration = new client.Histogram({
  name: 'ai_gateway_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

const httpRequestTotal = new client.Counter({
  name: 'ai_gateway_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

// Some upstreams are given up to five minutes.
const providerLatency = new client.Histogram({
  name: 'ai_gateway_provider_latency_seconds',
  help: 'Duration of upstream provider calls in seconds',
  labelNames: ['provider', 'model', 'status'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120, 300],
  registers: [register],
});

const tokensUsed = new client.Counter({
  name: 'ai_gateway_tokens_total',
  help: 'Total tokens reported by upstream providers',
  labelNames: ['provider', 'model', 'type'],
  registers: [register],
});

const batchProbeOutcomes = new client.Counter({
  name: 'ai_gateway_batch_probe_outcomes_total',
  help: 'Batch probe outcomes per provider',
  labelNames: ['provider', 'outcome'],
  registers: [register],
});

export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const route = request.routeOptions?.url ?? request.url;
    const labels = {
      method: request.method,
      route,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestTotal.inc(labels);
  });

  done();
}

export function trackProviderCall(
  provider: string,
  model: string,
  status: 'success' | 'error',
  durationSeconds: number
): void {
  providerLatency.observe({ provider, model, status }, durationSeconds);
}

export function trackTokens(
  provider: string,
  model: string,
  inputTokens: number,
  outputTokens: number
): void {
  tokensUsed.inc({ provider, model, type: 'input' }, inputTokens);
  tokensUsed.inc({ provider, model, type: 'output' }, outputTokens);
}

export function trackBatchProbeOutcome(provider: string, success: boolean): void {
  batchProbeOutcomes.inc({ provider, outcome: success ? 'success' : 'failure' });
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export { register };
