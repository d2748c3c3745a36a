import OpenAI from 'openai';
import { GenerationRequest, TextGenerator } from './types.js';
import { GenerationError, describeError } from '../util/errors.js';
import { logger } from '../util/logger.js';

export class OpenAIGenerator implements TextGenerator {
  private openai: OpenAI;
  readonly model: string;

  constructor(apiKey: string, model = 'gpt-4o-mini') {
    if (!apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.openai = new OpenAI({ apiKey });
    this.model = model;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.openai.chat.completions.create({
        model: this.model,
        messages,
        temperature: request.temperature ?? 0.2,
        max_tokens: request.maxTokens ?? 800,
        response_format: request.json ? { type: 'json_object' } : undefined,
      });
    } catch (error) {
      logger.error('[OpenAIGenerator] Completion request failed:', error);
      throw new GenerationError(`Generation request failed: ${describeError(error)}`, { cause: error });
    }

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new GenerationError('No content returned from OpenAI');
    }
    return content;
  }
}
