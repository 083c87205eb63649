import type { Container } from "inversify";

import type { Env } from "@/config/env";
import type { LoggerLike } from "@/infra/observability";
import type { AppointmentsGateway } from "./appointments.dto";
import { APPOINTMENTS_TYPES } from "./appointments.types";
import {
	AppointmentsHttpGateway,
	LoggingAppointmentsGateway,
} from "./appointments.client";

export function registerAppointmentsModule(
	container: Container,
	env: Pick<Env, "APPOINTMENTS_API_URL" | "APPOINTMENTS_API_TOKEN">,
	log?: LoggerLike
) {
	container
		.bind<AppointmentsGateway>(APPOINTMENTS_TYPES.AppointmentsGateway)
		.toDynamicValue(() => {
			if (env.APPOINTMENTS_API_URL && env.APPOINTMENTS_API_TOKEN) {
				return new AppointmentsHttpGateway(
					env.APPOINTMENTS_API_URL,
					env.APPOINTMENTS_API_TOKEN,
					log
				);
			}
			return new LoggingAppointmentsGateway(log);
		})
		.inSingletonScope();
}
