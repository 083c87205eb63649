export const NOTIFICATION_TYPES = {
	NotificationRepository: Symbol.for("NotificationRepository"),
	NotificationDispatcher: Symbol.for("NotificationDispatcher"),
	NotificationTemplates: Symbol.for("NotificationTemplates"),
	NotificationGateway: Symbol.for("NotificationGateway"),
} as const;
