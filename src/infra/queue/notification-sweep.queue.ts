import { Queue } from "bullmq";
import type { Redis } from "ioredis";

export const NOTIFICATION_SWEEP_QUEUE_NAME = "notifications";
export const NOTIFICATION_SWEEP_JOB_NAME = "notifications.sweepExpired";
export const NOTIFICATION_SWEEP_SCHEDULER_ID = "notifications-sweep-expired";

export type NotificationSweepJobName =
	| typeof NOTIFICATION_SWEEP_JOB_NAME
	| typeof NOTIFICATION_SWEEP_SCHEDULER_ID;
export type NotificationSweepJobData = Record<string, never>;
export type NotificationSweepQueue = Queue<
	NotificationSweepJobData,
	number,
	NotificationSweepJobName
>;

export function createNotificationSweepQueue(redis: Redis): NotificationSweepQueue {
	return new Queue<NotificationSweepJobData, number, NotificationSweepJobName>(
		NOTIFICATION_SWEEP_QUEUE_NAME,
		{ connection: redis }
	);
}

/** Idempotent: re-running replaces the existing schedule. */
export async function scheduleNotificationSweep(
	queue: NotificationSweepQueue,
	everyMs: number
): Promise<void> {
	await queue.upsertJobScheduler(
		NOTIFICATION_SWEEP_SCHEDULER_ID,
		{ every: everyMs },
		{
			name: NOTIFICATION_SWEEP_JOB_NAME,
			data: {},
			opts: { removeOnComplete: true, removeOnFail: 50 },
		}
	);
}
