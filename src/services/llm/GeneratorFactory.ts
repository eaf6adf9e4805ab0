import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import type { LLMConfig } from '../../config/validation.js';
import type { Generator } from './Generator.interface.js';
import { OpenAIGenerator } from './OpenAIGenerator.js';
import { AnthropicGenerator } from './AnthropicGenerator.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export class GeneratorFactory {
  static createGenerator(llm: LLMConfig): Generator {
    if (!llm.apiKey) {
      throw new InvalidConfigurationError(`API key required for LLM provider ${llm.provider}`);
    }
    const options = { model: llm.model, maxTokens: llm.maxTokens, name: llm.provider };

    switch (llm.provider) {
      case 'openai':
      case 'openrouter':
        logger.info({ provider: llm.provider, model: llm.model }, 'Initializing chat completions generator');
        return new OpenAIGenerator(OpenAIClientFactory.createClient(llm), options);
      case 'anthropic':
        logger.info({ model: llm.model }, 'Initializing Anthropic generator');
        return new AnthropicGenerator(new Anthropic({ apiKey: llm.apiKey, timeout: 60_000, maxRetries: 2 }), options);
    }
  }
}
