import type { FastifyInstance } from "fastify";
import type { Container } from "inversify";

import { NOTIFICATION_TYPES } from "./notifications.types";
import { NotificationDispatcher } from "./services/notification.dispatcher.service";
import { NotificationGateway } from "./services/notification-gateway.service";
import { registerNotificationsHttpRoutes } from "./controller/notifications.controller.http";
import { registerNotificationsWsRoutes } from "./controller/notifications.controller.ws";
import type { NotificationsControllerDeps } from "./controller/notifications.controller.types";

export function registerNotificationsRoutes(
	app: FastifyInstance,
	container: Container
): void {
	const deps: NotificationsControllerDeps = {
		dispatcher: container.get<NotificationDispatcher>(
			NOTIFICATION_TYPES.NotificationDispatcher
		),
		gateway: container.get<NotificationGateway>(
			NOTIFICATION_TYPES.NotificationGateway
		),
	};

	registerNotificationsHttpRoutes(app, deps);
	registerNotificationsWsRoutes(app, deps);
}
