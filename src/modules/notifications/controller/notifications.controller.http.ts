import type { FastifyInstance } from "fastify";

import { requireRequestUser, requireRequestUserId } from "@/infra/auth/requestUser";
import { UserFacingError } from "@/infra/userFacingError";

import { toPublicNotification } from "../notifications.dto";
import {
	CreateNotificationSchema,
	ListNotificationsQuerySchema,
	NotificationParamsSchema,
} from "../schemas/notifications.schemas";
import type { NotificationsControllerDeps } from "./notifications.controller.types";

/** Roles allowed to notify someone other than themselves. */
const NOTIFIER_ROLES = new Set(["admin", "service"]);

export function registerNotificationsHttpRoutes(
	app: FastifyInstance,
	deps: NotificationsControllerDeps
): void {
	app.get("/notifications", async (req) => {
		const userId = requireRequestUserId(req);
		const q = ListNotificationsQuerySchema.parse(req.query);

		const [items, unread] = await Promise.all([
			deps.dispatcher.listRecent(userId, q.limit),
			deps.dispatcher.unreadCount(userId),
		]);

		return {
			notifications: items.map(toPublicNotification),
			unread_count: unread,
		};
	});

	app.get("/notifications/unread-count", async (req) => {
		const userId = requireRequestUserId(req);
		return { count: await deps.dispatcher.unreadCount(userId) };
	});

	app.post("/notifications", async (req, reply) => {
		const user = requireRequestUser(req);
		const dto = CreateNotificationSchema.parse(req.body);

		if (dto.userId !== user.id && !NOTIFIER_ROLES.has(user.role ?? "")) {
			throw new UserFacingError({
				code: "FORBIDDEN",
				userMessage: "You cannot notify other users.",
				statusCode: 403,
			});
		}

		const created = await deps.dispatcher.create(dto);
		return reply.code(201).send(toPublicNotification(created));
	});

	app.post("/notifications/read-all", async (req) => {
		const userId = requireRequestUserId(req);
		const updated = await deps.dispatcher.markAllRead(userId);
		return { updated };
	});

	app.post("/notifications/dismiss-all", async (req) => {
		const userId = requireRequestUserId(req);
		const updated = await deps.dispatcher.dismissAll(userId);
		return { updated };
	});

	app.post("/notifications/:id/read", async (req) => {
		const userId = requireRequestUserId(req);
		const { id } = NotificationParamsSchema.parse(req.params);

		const n = await deps.dispatcher.markRead(id, userId);
		return toPublicNotification(n);
	});

	app.post("/notifications/:id/dismiss", async (req) => {
		const userId = requireRequestUserId(req);
		const { id } = NotificationParamsSchema.parse(req.params);

		const n = await deps.dispatcher.dismiss(id, userId);
		return toPublicNotification(n);
	});
}
