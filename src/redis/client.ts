import Redis from 'ioredis';
import { env } from '../env';
import { log } from '../log';

export type RedisClient = Redis;

let singleton: Redis | null | undefined;

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('connect', () => {
    log.info({ event: 'redis_connect' }, 'redis connect');
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('error', (error) => {
    log.error({ err: error }, 'redis error');
  });

  client.on('end', () => {
    log.warn({ event: 'redis_end' }, 'redis connection ended');
  });

  return client;
}

/** The shared client, or null when no REDIS_URL is configured. */
export function getRedisClient(): Redis | null {
  if (singleton === undefined) {
    singleton = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : null;
  }
  return singleton;
}

export async function closeRedisClient(): Promise<void> {
  if (singleton) {
    const client = singleton;
    singleton = null;
    await client.quit();
  }
}
