import OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { GenerationUnavailableError } from '../../utils/errors.js';
import { isTransientStatus } from '../../utils/retry.js';
import type { GenerationPrompt, Generator } from './Generator.interface.js';
import { GROUNDED_ANSWER_USER_PROMPT } from './prompts/grounded-answer.js';

export interface ChatGeneratorOptions {
  model: string;
  maxTokens: number;
  /** Provider label used in logs and errors. */
  name?: string;
}

/** Chat-completions generator; also serves OpenRouter through its OpenAI-compatible endpoint. */
export class OpenAIGenerator implements Generator {
  private name: string;

  constructor(private client: OpenAI, private options: ChatGeneratorOptions) {
    this.name = options.name ?? 'openai';
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      logger.warn({ provider: this.name, error }, 'Generator connection test failed');
      return false;
    }
  }

  async generate(prompt: GenerationPrompt, signal?: AbortSignal): Promise<string> {
    logger.debug(
      { provider: this.name, model: this.options.model, contextLength: prompt.context.length },
      'Sending generation request'
    );

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: prompt.instruction },
            { role: 'user', content: GROUNDED_ANSWER_USER_PROMPT(prompt.context, prompt.question) },
          ],
          temperature: 0.1,
          max_tokens: this.options.maxTokens,
        },
        { signal }
      );

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new GenerationUnavailableError(`Empty response from ${this.name}`, true);
      }

      logger.debug(
        { provider: this.name, model: completion.model, tokensUsed: completion.usage?.total_tokens },
        'Generation complete'
      );

      return content;
    } catch (error) {
      logger.error({ provider: this.name, error }, 'Generation failed');
      if (error instanceof GenerationUnavailableError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError) {
        const retryable =
          !(error instanceof OpenAI.APIUserAbortError) &&
          (error.status === undefined || isTransientStatus(error.status));
        throw new GenerationUnavailableError(`${this.name} API error: ${error.message}`, retryable, {
          status: error.status,
        });
      }
      throw new GenerationUnavailableError(`${this.name} API error`, false, error);
    }
  }
}
