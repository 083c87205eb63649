import { Worker } from "bullmq";
import type { Redis } from "ioredis";

import { ensureLogger, errorMessage, type LoggerLike } from "@/infra/observability";
import type { NotificationDispatcher } from "@/modules/notifications/services/notification.dispatcher.service";

import {
	NOTIFICATION_SWEEP_QUEUE_NAME,
	type NotificationSweepJobData,
	type NotificationSweepJobName,
} from "./notification-sweep.queue";

export function startNotificationSweepWorker(args: {
	redis: Redis;
	dispatcher: NotificationDispatcher;
	log?: LoggerLike;
}) {
	const lg = ensureLogger(args.log);

	const worker = new Worker<
		NotificationSweepJobData,
		number,
		NotificationSweepJobName
	>(
		NOTIFICATION_SWEEP_QUEUE_NAME,
		async () => args.dispatcher.sweepExpired(new Date(), lg),
		{
			connection: args.redis,
			concurrency: 1,
		}
	);

	worker.on("completed", (job, removed) => {
		lg.debug({ jobId: job.id, removed }, "notification sweep completed");
	});

	worker.on("failed", (job, err) => {
		lg.error(
			{
				err: errorMessage(err),
				jobId: job?.id ?? null,
				attemptsMade: job?.attemptsMade ?? null,
			},
			"notification sweep failed"
		);
	});

	worker.on("error", (err) => {
		lg.error({ err: errorMessage(err) }, "notification sweep worker error");
	});

	lg.info({ queue: NOTIFICATION_SWEEP_QUEUE_NAME }, "notification sweep worker started");

	return worker;
}
