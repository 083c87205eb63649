import type { Notification, NotificationPriority } from "../notifications.dto";

export interface NotificationInsert {
	userId: string;
	message: string;
	type: string;
	priority: NotificationPriority;
	actionUrl: string | null;
	actionText: string | null;
	metadata: Record<string, unknown>;
	expiresAt: Date | null;
}

export interface NotificationRepositoryPort {
	create(input: NotificationInsert): Promise<Notification>;
	countUnread(userId: string): Promise<number>;
	/** Non-dismissed, newest first. */
	listRecent(userId: string, limit: number): Promise<Notification[]>;

	/** Null when the id does not belong to the user. */
	markRead(id: string, userId: string): Promise<Notification | null>;
	markAllRead(userId: string): Promise<number>;
	dismiss(id: string, userId: string): Promise<Notification | null>;
	dismissAll(userId: string): Promise<number>;

	deleteExpired(now: Date): Promise<number>;
}
