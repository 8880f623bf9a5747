import pino from 'pino';
import { env } from './env';

export const log = pino({
  name: 'voice-screening-runtime',
  level: env.LOG_LEVEL,
});

export type Logger = typeof log;
