import Redis from 'ioredis';

export type RedisClientFactory = (redisUrl: string) => Redis;

export const createRedisClient: RedisClientFactory = redisUrl =>
  new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => {
      if (times > 3) return null;
      return Math.min(times * 100, 1000);
    },
  });
