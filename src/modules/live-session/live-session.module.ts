import type { Container } from "inversify";

import type { Env } from "@/config/env";

import { LIVE_SESSION_TYPES } from "./live-session.types";
import {
	liveSessionSettingsFromEnv,
	type LiveSessionSettings,
} from "./live-session.settings";
import type { LiveSessionRepositoryPort } from "./persistence/live-session.repository.port";
import { LiveSessionRepository } from "./persistence/live-session.repository";
import { LiveSessionCommandService } from "./services/live-session.command.service";
import { LiveSessionQueryService } from "./services/live-session.query.service";
import { SessionCoordinator } from "./services/session-coordinator.service";
import { SessionGateway } from "./services/session-gateway.service";
import { SessionRelayService } from "./services/session-relay.service";

export function registerLiveSessionModule(
	container: Container,
	env: Pick<Env, "SESSION_DEFAULT_DURATION_MINUTES">
) {
	container
		.bind<LiveSessionSettings>(LIVE_SESSION_TYPES.LiveSessionSettings)
		.toConstantValue(liveSessionSettingsFromEnv(env));

	container
		.bind<LiveSessionRepositoryPort>(LIVE_SESSION_TYPES.LiveSessionRepository)
		.to(LiveSessionRepository)
		.inSingletonScope();

	container
		.bind<LiveSessionCommandService>(LIVE_SESSION_TYPES.LiveSessionCommandService)
		.to(LiveSessionCommandService)
		.inSingletonScope();

	container
		.bind<LiveSessionQueryService>(LIVE_SESSION_TYPES.LiveSessionQueryService)
		.to(LiveSessionQueryService)
		.inSingletonScope();

	container
		.bind<SessionCoordinator>(LIVE_SESSION_TYPES.SessionCoordinator)
		.to(SessionCoordinator)
		.inSingletonScope();

	container
		.bind<SessionRelayService>(LIVE_SESSION_TYPES.SessionRelayService)
		.to(SessionRelayService)
		.inSingletonScope();

	container
		.bind<SessionGateway>(LIVE_SESSION_TYPES.SessionGateway)
		.to(SessionGateway)
		.inSingletonScope();
}
