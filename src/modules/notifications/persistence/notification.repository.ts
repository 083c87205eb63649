import { inject, injectable } from "inversify";
import { and, count, desc, eq, lt } from "drizzle-orm";

import type { Database } from "@/infra/db/client";
import { DB_TYPES } from "@/infra/db/db.types";
import { notifications } from "@/infra/db/schema";
import type { Notification } from "../notifications.dto";
import type {
	NotificationInsert,
	NotificationRepositoryPort,
} from "./notification.repository.port";

@injectable()
export class NotificationRepository implements NotificationRepositoryPort {
	constructor(
		@inject(DB_TYPES.Database)
		private readonly db: Database
	) {}

	async create(input: NotificationInsert): Promise<Notification> {
		const rows = await this.db.insert(notifications).values(input).returning();

		const row = rows[0];
		if (!row) {
			throw new Error("Notification insert returned no row");
		}
		return row;
	}

	async countUnread(userId: string): Promise<number> {
		const rows = await this.db
			.select({ value: count() })
			.from(notifications)
			.where(
				and(
					eq(notifications.userId, userId),
					eq(notifications.read, false),
					eq(notifications.dismissed, false)
				)
			);

		return rows[0]?.value ?? 0;
	}

	listRecent(userId: string, limit: number): Promise<Notification[]> {
		return this.db
			.select()
			.from(notifications)
			.where(
				and(eq(notifications.userId, userId), eq(notifications.dismissed, false))
			)
			.orderBy(desc(notifications.createdAt), desc(notifications.id))
			.limit(limit);
	}

	async markRead(id: string, userId: string): Promise<Notification | null> {
		const rows = await this.db
			.update(notifications)
			.set({ read: true })
			.where(and(eq(notifications.id, id), eq(notifications.userId, userId)))
			.returning();

		return rows[0] ?? null;
	}

	async markAllRead(userId: string): Promise<number> {
		const rows = await this.db
			.update(notifications)
			.set({ read: true })
			.where(and(eq(notifications.userId, userId), eq(notifications.read, false)))
			.returning({ id: notifications.id });

		return rows.length;
	}

	async dismiss(id: string, userId: string): Promise<Notification | null> {
		const rows = await this.db
			.update(notifications)
			.set({ dismissed: true })
			.where(and(eq(notifications.id, id), eq(notifications.userId, userId)))
			.returning();

		return rows[0] ?? null;
	}

	async dismissAll(userId: string): Promise<number> {
		const rows = await this.db
			.update(notifications)
			.set({ dismissed: true })
			.where(
				and(eq(notifications.userId, userId), eq(notifications.dismissed, false))
			)
			.returning({ id: notifications.id });

		return rows.length;
	}

	async deleteExpired(now: Date): Promise<number> {
		const rows = await this.db
			.delete(notifications)
			.where(lt(notifications.expiresAt, now))
			.returning({ id: notifications.id });

		return rows.length;
	}
}
