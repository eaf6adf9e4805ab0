import OpenAI from 'openai';
import { InvalidConfigurationError } from '../../utils/errors.js';
import type { LLMConfig } from '../../config/validation.js';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenAIClientFactory {
  static createClient(llm: LLMConfig): OpenAI {
    if (!llm.apiKey) {
      throw new InvalidConfigurationError(`API key required for LLM provider ${llm.provider}`);
    }

    return new OpenAI({
      apiKey: llm.apiKey,
      baseURL: llm.provider === 'openrouter' ? OPENROUTER_BASE_URL : undefined,
      timeout: 60_000,
      maxRetries: 2,
    });
  }
}
