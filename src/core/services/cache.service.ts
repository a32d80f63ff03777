import Redis from "ioredis";
import { logger } from "@config/logger";

export interface CacheConnectionOptions {
  host: string;
  port: number;
}

/**
 * Redis-backed JSON cache. Every operation degrades to a miss / no-op while
 * Redis is unavailable, so callers never depend on it being up.
 */
export class CacheService {
  private static redis: Redis | null = null;
  private static DEFAULT_TTL = 3600; // 1 hour in seconds
  private static isConnected = false;

  static async initialize(options: CacheConnectionOptions): Promise<void> {
    if (this.redis) {
      return;
    }

    logger.info("Connecting to Redis", { host: options.host, port: options.port });

    this.redis = new Redis({
      host: options.host,
      port: options.port,
      retryStrategy(times: number) {
        return Math.min(times * 500, 2000);
      },
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      reconnectOnError: (err: Error) => err.message.includes("READONLY"),
      showFriendlyErrorStack: process.env.NODE_ENV !== "production",
    });

    this.redis.on("ready", () => {
      this.isConnected = true;
      logger.info("Redis is ready to accept commands");
    });

    this.redis.on("error", (error) => {
      this.isConnected = false;
      logger.error("Redis connection error:", error);
    });

    this.redis.on("end", () => {
      this.isConnected = false;
    });

    try {
      await this.redis.ping();
      this.isConnected = true;
    } catch (error) {
      this.isConnected = false;
      logger.warn("Redis unavailable, operating without cache", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private static client(): Redis | null {
    return this.redis && this.isConnected ? this.redis : null;
  }

  /** Parsed JSON value, or null on a miss. Callers validate the shape. */
  static async get(key: string): Promise<unknown> {
    const redis = this.client();
    if (!redis) return null;

    try {
      const data = await redis.get(key);
      logger.debug(`Cache ${data ? "hit" : "miss"} for key ${key}`);
      return data ? JSON.parse(data) : null;
    } catch (error) {
      logger.error("Cache get error:", error);
      return null;
    }
  }

  static async set(key: string, value: unknown, ttl: number = this.DEFAULT_TTL): Promise<void> {
    const redis = this.client();
    if (!redis) return;

    try {
      await redis.setex(key, ttl, JSON.stringify(value));
    } catch (error) {
      logger.error("Cache set error:", error);
    }
  }

  static generateKey(prefix: string, id: string): string {
    return `${prefix}:${id}`;
  }

  static async disconnect(): Promise<void> {
    if (this.redis) {
      await this.redis.quit();
      this.redis = null;
      this.isConnected = false;
      logger.info("Redis disconnected");
    }
  }
}
