import type { Container } from "inversify";

import { NOTIFICATION_TYPES } from "./notifications.types";
import type { NotificationRepositoryPort } from "./persistence/notification.repository.port";
import { NotificationRepository } from "./persistence/notification.repository";
import { NotificationDispatcher } from "./services/notification.dispatcher.service";
import { NotificationGateway } from "./services/notification-gateway.service";
import { NotificationTemplates } from "./services/notification.templates";

export function registerNotificationsModule(container: Container) {
	container
		.bind<NotificationRepositoryPort>(NOTIFICATION_TYPES.NotificationRepository)
		.to(NotificationRepository)
		.inSingletonScope();

	container
		.bind<NotificationDispatcher>(NOTIFICATION_TYPES.NotificationDispatcher)
		.to(NotificationDispatcher)
		.inSingletonScope();

	container
		.bind<NotificationTemplates>(NOTIFICATION_TYPES.NotificationTemplates)
		.to(NotificationTemplates)
		.inSingletonScope();

	container
		.bind<NotificationGateway>(NOTIFICATION_TYPES.NotificationGateway)
		.to(NotificationGateway)
		.inSingletonScope();
}
