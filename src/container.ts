import "reflect-metadata";
import { Container } from "inversify";

import type { Env } from "./config/env";
import type { LoggerLike } from "./infra/observability";
import { registerDbModule } from "./infra/db/db.module";
import { registerQueueModule } from "./infra/queue/queue.module";
import { registerRealtimeModule } from "./infra/realtime/realtime.module";
import { registerAppointmentsModule } from "./capabilities/appointments/appointments.module";
import { registerLiveSessionModule } from "./modules/live-session/live-session.module";
import { registerNotificationsModule } from "./modules/notifications/notifications.module";

export function createContainer(env: Env, log?: LoggerLike): Container {
	const container = new Container();

	registerDbModule(container);
	registerRealtimeModule(container);
	registerQueueModule(container, env, log);
	registerAppointmentsModule(container, env, log);
	registerLiveSessionModule(container, env);
	registerNotificationsModule(container);

	return container;
}
