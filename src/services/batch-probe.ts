import { errorMessage, truncate } from '../errors.js';
import { logger } from '../middleware/logger.js';
import { trackBatchProbeOutcome } from '../middleware/metrics.js';
import type { ChatOrchestrator } from './chat-orchestrator.js';

export const PROBE_EXCERPT_LENGTH = 500;
export const DEFAULT_PROBE_MAX_TOKENS = 100;
export const DEFAULT_PROBE_TEMPERATURE = 0.7;
// Metric label for ids that are not configured, so callers cannot grow the series set.
export const UNKNOWN_PROVIDER_LABEL = 'unknown';

interface ProbeSuccess {
  provider: string;
  success: true;
  response: string;
  model: string;
  elapsedMs: number;
}

interface ProbeFailure {
  provider: string;
  success: false;
  error: string;
  elapsedMs: number;
}

export type BatchProbeOutcome = ProbeSuccess | ProbeFailure;

export interface BatchProbeInput {
  providerIds: string[];
  message: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Sends one test message to several providers at once. Every provider gets its own
 * timer and its own outcome; a failure or a slow upstream never affects the others.
 */
export class BatchProbe {
  constructor(private readonly orchestrator: ChatOrchestrator) {}

  async run({
    providerIds,
    message,
    maxTokens = DEFAULT_PROBE_MAX_TOKENS,
    temperature = DEFAULT_PROBE_TEMPERATURE,
  }: BatchProbeInput): Promise<BatchProbeOutcome[]> {
    logger.info({ providers: providerIds }, 'Batch probe started');

    const outcomes = await Promise.all(
      providerIds.map((providerId) => this.probe(providerId, message, maxTokens, temperature))
    );

    const succeeded = outcomes.filter((outcome) => outcome.success).length;
    logger.info({ providers: providerIds.length, succeeded }, 'Batch probe finished');
    return outcomes;
  }

  private async probe(
    providerId: string,
    message: string,
    maxTokens: number,
    temperature: number
  ): Promise<BatchProbeOutcome> {
    const startTime = Date.now();
    const elapsed = () => Math.max(0, Math.round(Date.now() - startTime));

    let outcome: BatchProbeOutcome;
    let configured = false;
    try {
      const result = await this.orchestrator.run({
        providerId,
        messages: [{ role: 'user', content: message }],
        maxTokens,
        temperature,
      });
      configured = result.success || result.error.kind !== 'not_found';

      outcome = result.success
        ? {
            provider: providerId,
            success: true,
            response: truncate(result.data.content, PROBE_EXCERPT_LENGTH),
            model: result.data.model,
            elapsedMs: elapsed(),
          }
        : { provider: providerId, success: false, error: result.error.message, elapsedMs: elapsed() };
    } catch (error) {
      outcome = { provider: providerId, success: false, error: errorMessage(error), elapsedMs: elapsed() };
    }

    trackBatchProbeOutcome(configured ? providerId : UNKNOWN_PROVIDER_LABEL, outcome.success);
    return outcome;
  }
}
