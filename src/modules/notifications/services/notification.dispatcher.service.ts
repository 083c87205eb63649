import { inject, injectable } from "inversify";

import { REALTIME_TYPES } from "@/infra/realtime/realtime.types";
import { RealtimeHub } from "@/infra/realtime/realtimeHub";
import { topics } from "@/infra/realtime/topics";
import type { LoggerLike } from "@/infra/observability";
import { ensureLogger, errorMessage } from "@/infra/observability";
import { UserFacingError } from "@/infra/userFacingError";

import {
	toPublicNotification,
	type CreateNotificationInput,
	type Notification,
	type NotificationPriority,
} from "../notifications.dto";
import { NOTIFICATION_TYPES } from "../notifications.types";
import type { NotificationWsServerEvent } from "../notifications.ws.schemas";
import type { NotificationRepositoryPort } from "../persistence/notification.repository.port";

export const DEFAULT_LIST_LIMIT = 10;
export const MAX_LIST_LIMIT = 100;
export const SYSTEM_NOTIFICATION_TTL_HOURS = 72;

export function clampListLimit(limit: number | undefined): number {
	if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIST_LIMIT;
	return Math.min(MAX_LIST_LIMIT, Math.max(1, Math.trunc(limit)));
}

function notFound(): UserFacingError {
	return new UserFacingError({
		code: "NOT_FOUND",
		userMessage: "Notification not found.",
		statusCode: 404,
	});
}

/**
 * Persists notifications and mirrors every change onto the owner's
 * `notifications_<userId>` topic. Pushes are best-effort: a user with no open
 * socket simply gets nothing.
 */
@injectable()
export class NotificationDispatcher {
	private readonly log: LoggerLike;

	constructor(
		@inject(NOTIFICATION_TYPES.NotificationRepository)
		private readonly repo: NotificationRepositoryPort,

		@inject(REALTIME_TYPES.RealtimeHub)
		private readonly hub: RealtimeHub
	) {
		this.log = ensureLogger();
	}

	async create(input: CreateNotificationInput): Promise<Notification> {
		const expiresAt =
			input.expiresInHours && input.expiresInHours > 0
				? new Date(Date.now() + input.expiresInHours * 3_600_000)
				: null;

		const notification = await this.repo.create({
			userId: input.userId,
			message: input.message,
			type: input.type ?? "general",
			priority: input.priority ?? "normal",
			actionUrl: input.actionUrl ?? null,
			actionText: input.actionText ?? null,
			metadata: input.metadata ?? {},
			expiresAt,
		});

		this.push(notification.userId, {
			type: "new_notification",
			notification: toPublicNotification(notification),
		});
		await this.pushCount(notification.userId);

		return notification;
	}

	async createSystemNotification(
		userIds: readonly string[],
		message: string,
		opts: {
			priority?: NotificationPriority;
			actionUrl?: string | null;
			actionText?: string | null;
		} = {}
	): Promise<Notification[]> {
		const created: Notification[] = [];
		for (const userId of userIds) {
			created.push(
				await this.create({
					userId,
					message,
					type: "system",
					priority: opts.priority,
					actionUrl: opts.actionUrl,
					actionText: opts.actionText,
					expiresInHours: SYSTEM_NOTIFICATION_TTL_HOURS,
					metadata: { system_notification: true },
				})
			);
		}
		return created;
	}

	unreadCount(userId: string): Promise<number> {
		return this.repo.countUnread(userId);
	}

	listRecent(userId: string, limit?: number): Promise<Notification[]> {
		return this.repo.listRecent(userId, clampListLimit(limit));
	}

	async markRead(id: string, userId: string): Promise<Notification> {
		const updated = await this.repo.markRead(id, userId);
		if (!updated) throw notFound();

		await this.pushCount(userId);
		return updated;
	}

	async markAllRead(userId: string): Promise<number> {
		const changed = await this.repo.markAllRead(userId);
		await this.pushCount(userId);
		return changed;
	}

	async dismiss(id: string, userId: string): Promise<Notification> {
		const updated = await this.repo.dismiss(id, userId);
		if (!updated) throw notFound();

		await this.pushCount(userId);
		return updated;
	}

	async dismissAll(userId: string): Promise<number> {
		const changed = await this.repo.dismissAll(userId);
		await this.pushCount(userId);
		return changed;
	}

	async sweepExpired(now: Date = new Date(), log?: LoggerLike): Promise<number> {
		const removed = await this.repo.deleteExpired(now);
		if (removed > 0) {
			ensureLogger(log).info({ removed }, "expired notifications removed");
		}
		return removed;
	}

	async pushCount(userId: string): Promise<void> {
		try {
			const count = await this.repo.countUnread(userId);
			this.push(userId, { type: "notification_count", count });
		} catch (err) {
			this.log.warn(
				{ userId, err: errorMessage(err) },
				"notification count push failed"
			);
		}
	}

	private push(userId: string, event: NotificationWsServerEvent): void {
		const report = this.hub.broadcast(topics.notifications(userId), event);
		for (const failure of report.failures) {
			this.log.warn({ userId, err: failure.message }, "notification push failed");
		}
	}
}
