import type { FastifyInstance } from "fastify";

import { errorMessage } from "@/infra/observability";
import { extractWsSocket, wsIdentity } from "@/infra/realtime/wsSocket";

import type { NotificationsControllerDeps } from "./notifications.controller.types";

export function registerNotificationsWsRoutes(
	app: FastifyInstance,
	deps: NotificationsControllerDeps
): void {
	app.get("/ws/notifications", { websocket: true }, (conn, req) => {
		try {
			deps.gateway.accept({
				socket: extractWsSocket(conn),
				identity: wsIdentity(req),
				log: req.log,
			});
		} catch (e) {
			req.log.warn({ err: errorMessage(e) }, "failed to extract ws socket");
		}
	});
}
