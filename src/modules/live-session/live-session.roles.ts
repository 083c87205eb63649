import type { ParticipantRole } from "./live-session.dto";

export type ResolvedRole = ParticipantRole | "none";

type RoleSource = {
	studentId: string;
	counselorId: string;
	observerIds?: readonly string[];
};

/**
 * Role of `userId` in the appointment behind a session. Pure; never consults
 * the caller's own claims.
 */
export function resolveRole(appointment: RoleSource, userId: string): ResolvedRole {
	if (appointment.studentId === userId) return "student";
	if (appointment.counselorId === userId) return "counselor";
	if (appointment.observerIds?.includes(userId)) return "observer";
	return "none";
}

/** Parties are the two identities designated on the appointment. */
export function isParty(role: ResolvedRole): role is "student" | "counselor" {
	return role === "student" || role === "counselor";
}
