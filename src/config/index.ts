import 'dotenv/config';
import { ZodError } from 'zod';
import { InvalidConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

const int = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : Number(value);

const str = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

const llmApiKey = (env: NodeJS.ProcessEnv): string | undefined => {
  switch (env.LLM_PROVIDER) {
    case 'anthropic':
      return str(env.ANTHROPIC_API_KEY);
    case 'openrouter':
      return str(env.OPENROUTER_API_KEY);
    default:
      return str(env.OPENAI_API_KEY);
  }
};

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const embeddingProvider = str(env.EMBEDDING_PROVIDER);

  const rawConfig = {
    server: {
      nodeEnv: str(env.NODE_ENV),
      port: int(env.PORT),
      logLevel: str(env.LOG_LEVEL),
    },
    embedding: {
      provider: embeddingProvider,
      apiKey: embeddingProvider === 'azure' ? str(env.AZURE_OPENAI_API_KEY) : str(env.OPENAI_API_KEY),
      model: str(env.EMBEDDING_MODEL),
      endpoint: str(env.AZURE_OPENAI_ENDPOINT),
      apiVersion: str(env.AZURE_OPENAI_API_VERSION),
      deployment: str(env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT),
      maxRetries: int(env.EMBEDDING_MAX_RETRIES),
      timeoutMs: int(env.EMBEDDING_TIMEOUT_MS),
    },
    llm: {
      provider: str(env.LLM_PROVIDER),
      apiKey: llmApiKey(env),
      model: str(env.LLM_MODEL),
      maxTokens: int(env.LLM_MAX_TOKENS),
    },
    chunking: {
      size: int(env.CHUNK_SIZE),
      overlap: int(env.CHUNK_OVERLAP),
      unit: str(env.CHUNK_UNIT),
    },
    ingestion: {
      batchSize: int(env.EMBEDDING_BATCH_SIZE),
      concurrency: int(env.EMBEDDING_CONCURRENCY),
    },
    index: {
      metric: str(env.INDEX_METRIC),
    },
    retrieval: {
      k: int(env.RETRIEVAL_K),
      maxContextLength: int(env.MAX_CONTEXT_LENGTH),
    },
    storage: {
      maxUploadSizeMB: int(env.MAX_UPLOAD_SIZE_MB),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new InvalidConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    throw error;
  }
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      console.error(`\n❌ ${error.message}\n`);
      console.error('Check .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
