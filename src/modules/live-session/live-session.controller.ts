import type { FastifyInstance } from "fastify";
import type { Container } from "inversify";

import { LIVE_SESSION_TYPES } from "./live-session.types";
import { LiveSessionCommandService } from "./services/live-session.command.service";
import { LiveSessionQueryService } from "./services/live-session.query.service";
import { SessionCoordinator } from "./services/session-coordinator.service";
import { SessionGateway } from "./services/session-gateway.service";
import { registerLiveSessionHttpRoutes } from "./controller/live-session.controller.http";
import { registerLiveSessionWsRoutes } from "./controller/live-session.controller.ws";
import type { LiveSessionControllerDeps } from "./controller/live-session.controller.types";

export function registerLiveSessionRoutes(
	app: FastifyInstance,
	container: Container
): void {
	const deps: LiveSessionControllerDeps = {
		commandService: container.get<LiveSessionCommandService>(
			LIVE_SESSION_TYPES.LiveSessionCommandService
		),
		queryService: container.get<LiveSessionQueryService>(
			LIVE_SESSION_TYPES.LiveSessionQueryService
		),
		coordinator: container.get<SessionCoordinator>(
			LIVE_SESSION_TYPES.SessionCoordinator
		),
		gateway: container.get<SessionGateway>(LIVE_SESSION_TYPES.SessionGateway),
	};

	registerLiveSessionHttpRoutes(app, deps);
	registerLiveSessionWsRoutes(app, deps);
}
