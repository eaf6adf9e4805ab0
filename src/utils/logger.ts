import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  name: 'fragment-retrieval',
  level: config.server.logLevel,
  redact: ['apiKey', '*.apiKey', 'headers.authorization', 'headers["api-key"]'],
  transport:
    config.server.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,name',
          },
        }
      : undefined,
});
