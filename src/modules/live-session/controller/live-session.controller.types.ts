import type { LiveSessionCommandService } from "../services/live-session.command.service";
import type { LiveSessionQueryService } from "../services/live-session.query.service";
import type { SessionCoordinator } from "../services/session-coordinator.service";
import type { SessionGateway } from "../services/session-gateway.service";

export type LiveSessionControllerDeps = {
	commandService: LiveSessionCommandService;
	queryService: LiveSessionQueryService;
	coordinator: SessionCoordinator;
	gateway: SessionGateway;
};
