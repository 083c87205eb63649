export const QUEUE_TYPES = {
	Redis: Symbol.for("Redis"),
	NotificationSweepQueue: Symbol.for("NotificationSweepQueue"),
} as const;
