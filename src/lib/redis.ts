import { createClient } from 'redis';

type RedisClient = ReturnType<typeof createClient>;

let redis: RedisClient | null = null;

export async function getRedisClient(): Promise<RedisClient | null> {
  if (!redis) {
    // Caching is optional: without REDIS_URL every request reads the data files
    if (!process.env.REDIS_URL) {
      return null;
    }

    console.log('Attempting Redis connection with URL:', process.env.REDIS_URL.replace(/:[^:]*@/, ':***@')); // Hide password in logs

    const client = createClient({
      url: process.env.REDIS_URL,
      socket: {
        connectTimeout: 10000,
        reconnectStrategy: (retries: number) => {
          if (retries > 3) {
            console.log('Redis max retries exceeded, disabling cache');
            return false;
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    client.on('error', (err: unknown) => {
      console.log('Redis Client Error', err);
      redis = null; // Reset client on error
    });

    client.on('connect', () => {
      console.log('Redis client connected');
    });

    try {
      await client.connect();
      redis = client;
    } catch (error) {
      console.warn('Redis connection failed, continuing without cache:', error);
      redis = null;
    }
  }

  return redis;
}

export async function closeRedisClient(): Promise<void> {
  const client = redis;
  redis = null;
  if (client) {
    await client.quit();
  }
}

export async function cacheGet<T>(key: string, isValue: (value: unknown) => value is T): Promise<T | null> {
  try {
    const client = await getRedisClient();
    if (!client) return null;

    const value = await client.get(key);
    if (!value) return null;

    const parsed: unknown = JSON.parse(value);
    return isValue(parsed) ? parsed : null;
  } catch (error) {
    console.warn('Redis get error:', error);
    return null;
  }
}

export async function cacheSet(key: string, value: unknown, ttlSeconds: number = 3600): Promise<boolean> {
  try {
    const client = await getRedisClient();
    if (!client) return false;

    await client.setEx(key, ttlSeconds, JSON.stringify(value));
    return true;
  } catch (error) {
    console.warn('Redis set error:', error);
    return false;
  }
}

export async function cacheDelete(keys: string[]): Promise<boolean> {
  try {
    const client = await getRedisClient();
    if (!client || keys.length === 0) return false;

    await client.del(keys);
    return true;
  } catch (error) {
    console.warn('Redis delete error:', error);
    return false;
  }
}

export function generateDashboardKey(region: string | null): string {
  return `dashboard:rivers:${region ?? 'all'}`;
}

// Cache configuration constants
export const CACHE_TTL = {
  DASHBOARD: 5 * 60, // 5 minutes - the batch runs every few minutes
};
