/**
 * ioredis connection factory
 *
 * Every Redis connection gets the same exponential-backoff retry, timeouts
 * and scoped logging.
 *
 * Usage:
 *   const redis = createIORedisClient("response-cache", config.redisUrl);
 */

import Redis, { RedisOptions } from "ioredis";
import { logger } from "./logger";

const MAX_RETRY_DELAY_MS = 30_000;
const BASE_RETRY_DELAY_MS = 250;

/** Backoff: 250ms, 500ms, 1s, 2s, ... capped at 30s. */
export function retryDelayMs(attempt: number): number {
    return Math.min(
        BASE_RETRY_DELAY_MS * Math.pow(2, attempt - 1),
        MAX_RETRY_DELAY_MS,
    );
}

export function createIORedisClient(
    label: string,
    url: string,
    overrides: Partial<RedisOptions> = {},
): Redis {
    const log = logger.child(`ioredis:${label}`);

    const client = new Redis(url, {
        retryStrategy(times: number) {
            const delay = retryDelayMs(times);
            log.debug(`Reconnect attempt ${times} - retrying in ${delay}ms`);
            return delay;
        },
        maxRetriesPerRequest: 3,
        connectTimeout: 10_000,
        enableReadyCheck: true,
        lazyConnect: false,
        ...overrides,
    });

    client.on("error", (err: Error) => {
        log.error(`Error: ${err.message}`);
    });

    client.on("reconnecting", (ms: number) => {
        log.debug(`Reconnecting in ${ms}ms...`);
    });

    client.on("ready", () => {
        log.debug("Ready");
    });

    return client;
}
