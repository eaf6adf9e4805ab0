import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger.js';
import { GenerationUnavailableError } from '../../utils/errors.js';
import { isTransientStatus } from '../../utils/retry.js';
import type { GenerationPrompt, Generator } from './Generator.interface.js';
import type { ChatGeneratorOptions } from './OpenAIGenerator.js';
import { GROUNDED_ANSWER_USER_PROMPT } from './prompts/grounded-answer.js';

export class AnthropicGenerator implements Generator {
  constructor(private client: Anthropic, private options: ChatGeneratorOptions) {}

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.options.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch (error) {
      logger.warn({ provider: 'anthropic', error }, 'Generator connection test failed');
      return false;
    }
  }

  async generate(prompt: GenerationPrompt, signal?: AbortSignal): Promise<string> {
    logger.debug(
      { provider: 'anthropic', model: this.options.model, contextLength: prompt.context.length },
      'Sending generation request'
    );

    try {
      const message = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          temperature: 0.1,
          system: prompt.instruction,
          messages: [{ role: 'user', content: GROUNDED_ANSWER_USER_PROMPT(prompt.context, prompt.question) }],
        },
        { signal }
      );

      const text = message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) {
        throw new GenerationUnavailableError('Empty response from Anthropic', true);
      }

      logger.debug(
        { provider: 'anthropic', model: message.model, tokensUsed: message.usage.input_tokens + message.usage.output_tokens },
        'Generation complete'
      );

      return text;
    } catch (error) {
      logger.error({ provider: 'anthropic', error }, 'Generation failed');
      if (error instanceof GenerationUnavailableError) {
        throw error;
      }
      if (error instanceof Anthropic.APIError) {
        const retryable =
          !(error instanceof Anthropic.APIUserAbortError) &&
          (error.status === undefined || isTransientStatus(error.status));
        throw new GenerationUnavailableError(`Anthropic API error: ${error.message}`, retryable, {
          status: error.status,
        });
      }
      throw new GenerationUnavailableError('Anthropic API error', false, error);
    }
  }
}
