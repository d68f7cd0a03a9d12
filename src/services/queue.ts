/**
 * Shared queue publishing over Redis lists.
 *
 * Each queue is a Redis list; consumers BLPOP from the head. Publishing is
 * optional: without REDIS_URL every publish is a logged no-op.
 */

import { Redis } from "ioredis";

/** The slice of the Redis client the publisher uses. */
export interface QueueConnection {
  rpush(key: string, value: string): Promise<number>;
  quit(): Promise<string>;
}

export interface QueuePublisher {
  readonly enabled: boolean;
  publish(queue: string, payload: string): Promise<void>;
  close(): Promise<void>;
}

export class RedisQueuePublisher implements QueuePublisher {
  readonly enabled = true;

  constructor(private readonly redis: QueueConnection) {}

  async publish(queue: string, payload: string): Promise<void> {
    await this.redis.rpush(queue, payload);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

export class DisabledQueuePublisher implements QueuePublisher {
  readonly enabled = false;

  async publish(queue: string): Promise<void> {
    console.debug(`[queue] Queue publishing not configured; dropped message for ${queue}`);
  }

  async close(): Promise<void> {}
}

export function createQueuePublisher(redisUrl: string | undefined): QueuePublisher {
  if (!redisUrl) {
    console.log("[queue] REDIS_URL is not set. Queue publishing disabled.");
    return new DisabledQueuePublisher();
  }
  const redis = new Redis(redisUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
  });
  redis.on("error", (err) => console.error("[queue] Redis connection error:", err));
  return new RedisQueuePublisher(redis);
}
