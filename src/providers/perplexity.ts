import type OpenAI from 'openai';
import { OpenAICompatibleProvider } from './openai-compatible.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCitationList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Perplexity has placed `citations` at the top level, on the first choice, and on
 * the first choice's message. The first non-empty list wins.
 */
export function findCitations(body: unknown): string[] {
  if (!isRecord(body)) return [];

  const choices = Array.isArray(body.choices) ? body.choices : [];
  const firstChoice: unknown = choices[0];
  const choice: Record<string, unknown> = isRecord(firstChoice) ? firstChoice : {};
  const message: Record<string, unknown> = isRecord(choice.message) ? choice.message : {};

  for (const candidate of [body.citations, choice.citations, message.citations]) {
    const citations = toCitationList(candidate);
    if (citations.length > 0) return citations;
  }
  return [];
}

export class PerplexityProvider extends OpenAICompatibleProvider {
  readonly name = 'perplexity';
  protected readonly label = 'Perplexity';

  protected override extractCitations(response: OpenAI.Chat.ChatCompletion): string[] {
    return findCitations(response);
  }
}
