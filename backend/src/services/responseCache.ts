import { createHash } from "crypto";
import { config } from "../config";
import { createIORedisClient } from "../utils/ioredis";
import { logger, type Logger } from "../utils/logger";

/** The slice of the Redis API the cache uses. */
export interface CacheStore {
    get(key: string): Promise<string | null>;
    setex(key: string, seconds: number, value: string): Promise<unknown>;
}

export const DEFAULT_RESPONSE_TTL_SECONDS = 300;

/**
 * Caches upstream JSON payloads in Redis.
 *
 * Without a store every call goes straight to the loader. Redis failures are
 * logged and otherwise ignored: a broken cache never fails a request.
 */
export class ResponseCache {
    constructor(
        private readonly store: CacheStore | null,
        private readonly log: Logger = logger.child("ResponseCache"),
    ) {}

    get enabled(): boolean {
        return this.store !== null;
    }

    /** Builds a key that never exposes its raw parts (tokens included). */
    static key(namespace: string, ...parts: unknown[]): string {
        const digest = createHash("sha256")
            .update(JSON.stringify(parts))
            .digest("hex")
            .slice(0, 32);
        return `${namespace}:${digest}`;
    }

    async wrap(
        key: string,
        ttlSeconds: number,
        load: () => Promise<unknown>,
    ): Promise<unknown> {
        if (!this.store) {
            return load();
        }

        try {
            const cached = await this.store.get(key);
            if (cached !== null) {
                this.log.debug(`Cache hit: ${key}`);
                return JSON.parse(cached);
            }
        } catch (error) {
            this.log.warn(`Cache read failed: ${key}`, { error });
        }

        const value = await load();

        try {
            await this.store.setex(key, ttlSeconds, JSON.stringify(value));
        } catch (error) {
            this.log.warn(`Cache write failed: ${key}`, { error });
        }

        return value;
    }
}

export const responseCache = new ResponseCache(
    config.redisUrl ? createIORedisClient("response-cache", config.redisUrl) : null,
);
