import type { LiveSessionStatus } from "./live-session.dto";

/**
 * Allowed status moves. Anything not listed here is rejected.
 */
const TRANSITIONS: Record<LiveSessionStatus, readonly LiveSessionStatus[]> = {
	scheduled: ["waiting", "cancelled"],
	waiting: ["active", "cancelled"],
	active: ["completed", "no_show"],
	completed: [],
	cancelled: [],
	no_show: [],
};

export const TERMINAL_STATUSES: readonly LiveSessionStatus[] = [
	"completed",
	"cancelled",
	"no_show",
];

export function isTerminal(status: LiveSessionStatus): boolean {
	return TERMINAL_STATUSES.includes(status);
}

export function canTransition(
	from: LiveSessionStatus,
	to: LiveSessionStatus
): boolean {
	return TRANSITIONS[from].includes(to);
}
