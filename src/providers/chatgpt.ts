import type OpenAI from 'openai';
import type { ChatRequest } from './base.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';

export class ChatGPTProvider extends OpenAICompatibleProvider {
  readonly name = 'chatgpt';
  protected readonly label = 'ChatGPT';

  // Newer OpenAI models reject `max_tokens`.
  protected override buildParams(request: ChatRequest): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
    return {
      model: this.model,
      messages: this.buildMessages(request),
      temperature: request.temperature,
      max_completion_tokens: request.maxTokens,
    };
  }
}
