import type { Env } from "@/config/env";

export type LiveSessionSettings = {
	defaultDurationMinutes: number;
	messageHistoryLimit: number;
};

export function liveSessionSettingsFromEnv(
	env: Pick<Env, "SESSION_DEFAULT_DURATION_MINUTES">
): LiveSessionSettings {
	return {
		defaultDurationMinutes: env.SESSION_DEFAULT_DURATION_MINUTES,
		messageHistoryLimit: 500,
	};
}
