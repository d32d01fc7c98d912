/**
 * Redis Client Module
 *
 * Singleton ioredis client used to mirror batch progress for the API.
 *
 * Redis is OPTIONAL: classification never touches it, and every call goes
 * through safeRedisOperation / safeRedisWrite, which log failures and fall
 * back instead of throwing.
 */

import Redis, { type RedisOptions } from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

/**
 * Connection options; BullMQ builds its own connection from the same host/port.
 */
export function getRedisOptions(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // Fail fast so a missing Redis never stalls a request
    maxRetriesPerRequest: 1,
    // 100ms, 200ms, 300ms, then give up until the next getRedisClient()
    retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 100, 400)),
    lazyConnect: true,
  };
}

// ============================================
// Client State
// ============================================

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

function createRedisClient(): Redis | null {
  try {
    const options = getRedisOptions();
    const client = new Redis(options);

    client.on('ready', () => {
      isConnected = true;
      logger.info(`📦 Redis connected (${env.REDIS_HOST}:${env.REDIS_PORT})`);
    });

    client.on('error', (error: Error) => {
      isConnected = false;
      logger.warn(`Redis error (non-fatal): ${error.message}`);
    });

    client.on('close', () => {
      isConnected = false;
      logger.debug('Redis connection closed');
    });

    client.on('reconnecting', () => {
      logger.debug('Redis reconnecting...');
    });

    return client;
  } catch (error) {
    logger.warn(`Failed to create Redis client (non-fatal): ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Gets the Redis client, creating and connecting it on first use
 *
 * @returns Redis client or null if unavailable
 */
export function getRedisClient(): Redis | null {
  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();

    redisClient?.connect().catch((error: unknown) => {
      isConnected = false;
      logger.warn(`Redis initial connection failed (non-fatal): ${errorMessage(error)}`);
    });
  }

  return redisClient;
}

/**
 * True once the client has connected and until it drops
 */
export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Safely disconnects from Redis during shutdown
 */
export async function disconnectRedis(): Promise<void> {
  if (!redisClient) return;

  try {
    await redisClient.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${errorMessage(error)}`);
  } finally {
    redisClient = null;
    isConnected = false;
    connectionAttempted = false;
  }
}

// ============================================
// Safe Redis Operations
// ============================================

/**
 * Runs a Redis read, returning the fallback when Redis is down or the
 * command fails
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    logger.debug(`${operationName}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${errorMessage(error)}`);
    return fallback;
  }
}

/**
 * Fire-and-forget variant for cache writes
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
    },
    undefined,
    operationName
  );
}
