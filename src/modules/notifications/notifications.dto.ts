export const NOTIFICATION_PRIORITIES = ["low", "normal", "high", "urgent"] as const;
export type NotificationPriority = (typeof NOTIFICATION_PRIORITIES)[number];

/** Known kinds. The column is open, so anything else is stored as given. */
export const KNOWN_NOTIFICATION_KINDS = [
	"appointment",
	"report",
	"system",
	"reminder",
	"feedback",
	"followup",
	"general",
] as const;

export type Notification = {
	id: string;
	userId: string;
	message: string;
	type: string;
	priority: NotificationPriority;
	actionUrl: string | null;
	actionText: string | null;
	metadata: Record<string, unknown>;
	createdAt: Date;
	expiresAt: Date | null;
	read: boolean;
	dismissed: boolean;
};

export type CreateNotificationInput = {
	userId: string;
	message: string;
	type?: string;
	priority?: NotificationPriority;
	actionUrl?: string | null;
	actionText?: string | null;
	expiresInHours?: number | null;
	metadata?: Record<string, unknown>;
};

const ICONS: Record<string, string> = {
	appointment: "bx-calendar",
	report: "bx-file",
	system: "bx-cog",
	reminder: "bx-bell",
	feedback: "bx-message-dots",
	general: "bx-info-circle",
};

const COLORS: Record<NotificationPriority, string> = {
	low: "#6c757d",
	normal: "#007bff",
	high: "#fd7e14",
	urgent: "#dc3545",
};

export function notificationIcon(type: string): string {
	return ICONS[type] ?? "bx-info-circle";
}

export function notificationColor(priority: string): string {
	const known = NOTIFICATION_PRIORITIES.find((p) => p === priority);
	return known ? COLORS[known] : COLORS.normal;
}

export function toPublicNotification(n: Notification) {
	return {
		id: n.id,
		message: n.message,
		type: n.type,
		priority: n.priority,
		action_url: n.actionUrl,
		action_text: n.actionText,
		created_at: n.createdAt.toISOString(),
		expires_at: n.expiresAt ? n.expiresAt.toISOString() : null,
		read: n.read,
		dismissed: n.dismissed,
		icon: notificationIcon(n.type),
		color: notificationColor(n.priority),
		metadata: n.metadata,
	};
}

export type PublicNotification = ReturnType<typeof toPublicNotification>;
