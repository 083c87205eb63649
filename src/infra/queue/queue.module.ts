import type { Container } from "inversify";
import type { Redis } from "ioredis";

import type { Env } from "@/config/env";
import { ensureLogger, type LoggerLike } from "@/infra/observability";

import { tryCreateRedisClient } from "./redis.client";
import { QUEUE_TYPES } from "./queue.types";
import {
	createNotificationSweepQueue,
	type NotificationSweepQueue,
} from "./notification-sweep.queue";

export function registerQueueModule(
	container: Container,
	env: Pick<Env, "REDIS_URL">,
	log?: LoggerLike
) {
	const redis = tryCreateRedisClient(env.REDIS_URL, log);

	if (!redis) {
		ensureLogger(log).warn({}, "REDIS_URL not set; expiry sweep disabled");
		return;
	}

	container.bind<Redis>(QUEUE_TYPES.Redis).toConstantValue(redis);
	container
		.bind<NotificationSweepQueue>(QUEUE_TYPES.NotificationSweepQueue)
		.toConstantValue(createNotificationSweepQueue(redis));
}
