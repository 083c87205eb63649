export const LIVE_SESSION_STATUSES = [
	"scheduled",
	"waiting",
	"active",
	"completed",
	"cancelled",
	"no_show",
] as const;
export type LiveSessionStatus = (typeof LIVE_SESSION_STATUSES)[number];

export const LIVE_SESSION_KINDS = ["video", "audio", "chat"] as const;
export type LiveSessionKind = (typeof LIVE_SESSION_KINDS)[number];

export const PARTICIPANT_ROLES = ["student", "counselor", "observer"] as const;
export type ParticipantRole = (typeof PARTICIPANT_ROLES)[number];

export type PrivacyLevel = "private" | "supervised" | "training";
export type ConnectionQuality = "excellent" | "good" | "fair" | "poor";
export type SessionMessageType = "text" | "system";

/**
 * The slice of an appointment this service needs. Appointments live in the
 * booking service; this is the snapshot handed over at session creation.
 */
export type LiveSession = {
	id: string;
	appointmentId: string;
	studentId: string;
	counselorId: string;
	observerIds: string[];
	sessionType: LiveSessionKind;
	status: LiveSessionStatus;
	roomId: string;
	scheduledStart: Date;
	scheduledEnd: Date;
	actualStart: Date | null;
	actualEnd: Date | null;
	notes: string;
	isRecorded: boolean;
	consentGiven: boolean;
	privacyLevel: PrivacyLevel;
	createdAt: Date;
	updatedAt: Date;
};

export type SessionParticipant = {
	id: string;
	sessionId: string;
	userId: string;
	username: string;
	role: ParticipantRole;
	joinedAt: Date;
	leftAt: Date | null;
	connectionQuality: ConnectionQuality | null;
};

export type SessionMessage = {
	id: string;
	sessionId: string;
	senderId: string;
	senderUsername: string;
	message: string;
	messageType: SessionMessageType;
	timestamp: Date;
};

export type CreateLiveSessionInput = {
	appointmentId: string;
	sessionType?: LiveSessionKind;
};

export type CreateLiveSessionResult = {
	session: LiveSession;
	created: boolean;
};

export function durationMinutes(
	session: Pick<LiveSession, "actualStart" | "actualEnd">
): number | null {
	if (!session.actualStart || !session.actualEnd) return null;
	return (session.actualEnd.getTime() - session.actualStart.getTime()) / 60_000;
}

function toIso(d: Date | null): string | null {
	return d ? d.toISOString() : null;
}

export function toPublicSession(session: LiveSession) {
	return {
		id: session.id,
		appointmentId: session.appointmentId,
		roomId: session.roomId,
		sessionType: session.sessionType,
		status: session.status,
		scheduledStart: session.scheduledStart.toISOString(),
		scheduledEnd: session.scheduledEnd.toISOString(),
		actualStart: toIso(session.actualStart),
		actualEnd: toIso(session.actualEnd),
		durationMinutes: durationMinutes(session),
		notes: session.notes,
		isRecorded: session.isRecorded,
		consentGiven: session.consentGiven,
		privacyLevel: session.privacyLevel,
		meetingUrl: `/live-session/${session.roomId}/`,
		createdAt: session.createdAt.toISOString(),
		updatedAt: session.updatedAt.toISOString(),
	};
}

export type PublicSession = ReturnType<typeof toPublicSession>;

export function toPublicParticipant(p: SessionParticipant) {
	return {
		userId: p.userId,
		username: p.username,
		role: p.role,
		joinedAt: p.joinedAt.toISOString(),
		leftAt: toIso(p.leftAt),
		connected: p.leftAt === null,
		connectionQuality: p.connectionQuality,
	};
}

export function toPublicMessage(m: SessionMessage) {
	return {
		id: m.id,
		sender: m.senderUsername,
		senderId: m.senderId,
		message: m.message,
		messageType: m.messageType,
		timestamp: m.timestamp.toISOString(),
	};
}
