import type { Container } from "inversify";
import type { Redis } from "ioredis";

import type { Env } from "@/config/env";
import { ensureLogger, type LoggerLike } from "@/infra/observability";
import { NOTIFICATION_TYPES } from "@/modules/notifications/notifications.types";
import type { NotificationDispatcher } from "@/modules/notifications/services/notification.dispatcher.service";

import { QUEUE_TYPES } from "./queue.types";
import {
	scheduleNotificationSweep,
	type NotificationSweepQueue,
} from "./notification-sweep.queue";
import { startNotificationSweepWorker } from "./notification-sweep.worker";

export type WorkersHandle = {
	close: () => Promise<void>;
};

export async function startWorkers(
	container: Container,
	env: Pick<Env, "NOTIFICATION_SWEEP_EVERY_MS">,
	log?: LoggerLike
): Promise<WorkersHandle | null> {
	const lg = ensureLogger(log);

	if (!container.isBound(QUEUE_TYPES.Redis)) {
		lg.warn({}, "Redis is not configured; workers not started");
		return null;
	}

	const redis = container.get<Redis>(QUEUE_TYPES.Redis);
	const queue = container.get<NotificationSweepQueue>(
		QUEUE_TYPES.NotificationSweepQueue
	);

	await scheduleNotificationSweep(queue, env.NOTIFICATION_SWEEP_EVERY_MS);

	const worker = startNotificationSweepWorker({
		redis,
		dispatcher: container.get<NotificationDispatcher>(
			NOTIFICATION_TYPES.NotificationDispatcher
		),
		log: lg,
	});

	lg.info({ everyMs: env.NOTIFICATION_SWEEP_EVERY_MS }, "Workers started");

	return {
		async close() {
			lg.info({}, "Shutting down workers...");

			try {
				await worker.close();
				await queue.close();
			} catch (err) {
				lg.error({ err }, "Worker close error");
			}

			try {
				await redis.quit();
			} catch (err) {
				lg.error({ err }, "Redis quit error");
			}

			lg.info({}, "Workers stopped");
		},
	};
}
