import { createClient } from 'redis';
import { getConfig } from './index';

const config = getConfig();

const reconnectStrategy = (retries: number): number | false => {
  if (retries > 20) {
    console.error('[redis] Max retries reached');
    return false;
  }
  return Math.min(retries * 200, 5000);
};

const redisClient = createClient({
  url: config.redisUrl,
  socket: config.redisTls
    ? { tls: true, reconnectStrategy, connectTimeout: 30000 }
    : { reconnectStrategy, connectTimeout: 30000 },
});

redisClient.on('error', (err) => {
  console.error('[redis] Client error', err);
});

redisClient.on('connect', () => {
  console.log('[redis] Client connected');
});

redisClient.on('reconnecting', () => {
  console.log('[redis] Client reconnecting...');
});

export type RedisClient = typeof redisClient;

export const connectRedis = async (): Promise<RedisClient> => {
  if (!redisClient.isOpen) {
    await redisClient.connect();
  }
  return redisClient;
};

export default redisClient;
