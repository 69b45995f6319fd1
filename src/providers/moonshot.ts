import { OpenAICompatibleProvider } from './openai-compatible.js';

/** Moonshot (Kimi) serves the OpenAI chat-completions format unchanged. */
export class MoonshotProvider extends OpenAICompatibleProvider {
  readonly name = 'moonshot';
  protected readonly label = 'Moonshot';
}
