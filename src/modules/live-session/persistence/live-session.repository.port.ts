import type {
	LiveSession,
	LiveSessionKind,
	LiveSessionStatus,
	ParticipantRole,
	SessionMessage,
	SessionMessageType,
	SessionParticipant,
} from "../live-session.dto";

export interface LiveSessionInsert {
	appointmentId: string;
	studentId: string;
	counselorId: string;
	observerIds: string[];
	sessionType: LiveSessionKind;
	roomId: string;
	scheduledStart: Date;
	scheduledEnd: Date;
}

export interface StatusTransition {
	sessionId: string;
	from: LiveSessionStatus;
	to: LiveSessionStatus;
	at: Date;
	actualStart?: Date;
	actualEnd?: Date;
}

export interface ParticipantJoin {
	sessionId: string;
	userId: string;
	username: string;
	role: ParticipantRole;
	joinedAt: Date;
}

export interface MessageAppend {
	sessionId: string;
	senderId: string;
	senderUsername: string;
	message: string;
	messageType: SessionMessageType;
	timestamp: Date;
}

export interface LiveSessionRepositoryPort {
	/**
	 * Inserts unless a session for the appointment exists. Returns the stored row
	 * either way; `created` tells which.
	 */
	createIfAbsent(
		input: LiveSessionInsert
	): Promise<{ session: LiveSession; created: boolean }>;
	findById(sessionId: string): Promise<LiveSession | null>;
	findByRoomId(roomId: string): Promise<LiveSession | null>;
	findByAppointmentId(appointmentId: string): Promise<LiveSession | null>;

	/** Compare-and-set on status. Null when the row was not in `from`. */
	transitionStatus(input: StatusTransition): Promise<LiveSession | null>;
	updateNotes(sessionId: string, notes: string): Promise<LiveSession | null>;
	updateConsent(
		sessionId: string,
		consentGiven: boolean
	): Promise<LiveSession | null>;

	upsertParticipant(input: ParticipantJoin): Promise<SessionParticipant>;
	markParticipantLeft(
		sessionId: string,
		userId: string,
		leftAt: Date
	): Promise<SessionParticipant | null>;
	listConnectedParticipants(sessionId: string): Promise<SessionParticipant[]>;
	listParticipants(sessionId: string): Promise<SessionParticipant[]>;

	appendMessage(input: MessageAppend): Promise<SessionMessage>;
	listMessages(
		sessionId: string,
		opts: { limit: number }
	): Promise<SessionMessage[]>;
}
