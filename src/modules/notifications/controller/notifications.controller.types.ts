import type { NotificationDispatcher } from "../services/notification.dispatcher.service";
import type { NotificationGateway } from "../services/notification-gateway.service";

export type NotificationsControllerDeps = {
	dispatcher: NotificationDispatcher;
	gateway: NotificationGateway;
};
