import IORedis, { type Redis } from "ioredis";

import { ensureLogger, errorMessage, type LoggerLike } from "@/infra/observability";

/**
 * Creates a Redis client when a URL is configured.
 * Returns null otherwise, so tests and local runs work without Redis.
 */
export function tryCreateRedisClient(
	url: string | undefined,
	log?: LoggerLike
): Redis | null {
	const trimmed = url?.trim();
	if (!trimmed) return null;

	const lg = ensureLogger(log);
	const redis = new IORedis(trimmed, {
		// BullMQ recommendation: do not retry per request (it can stall jobs)
		maxRetriesPerRequest: null,
		enableReadyCheck: false,
		lazyConnect: true,
	});

	redis.on("error", (err: unknown) => {
		lg.error({ err: errorMessage(err) }, "redis error");
	});

	return redis;
}
