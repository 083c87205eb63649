import { inject, injectable } from "inversify";
import { and, asc, eq, isNull } from "drizzle-orm";

import type { Database } from "@/infra/db/client";
import { DB_TYPES } from "@/infra/db/db.types";
import {
	liveSessions,
	sessionMessages,
	sessionParticipants,
} from "@/infra/db/schema";
import type {
	LiveSession,
	SessionMessage,
	SessionParticipant,
} from "../live-session.dto";
import type {
	LiveSessionInsert,
	LiveSessionRepositoryPort,
	MessageAppend,
	ParticipantJoin,
	StatusTransition,
} from "./live-session.repository.port";

@injectable()
export class LiveSessionRepository implements LiveSessionRepositoryPort {
	constructor(
		@inject(DB_TYPES.Database)
		private readonly db: Database
	) {}

	async createIfAbsent(input: LiveSessionInsert) {
		const inserted = await this.db
			.insert(liveSessions)
			.values({
				appointmentId: input.appointmentId,
				studentId: input.studentId,
				counselorId: input.counselorId,
				observerIds: input.observerIds,
				sessionType: input.sessionType,
				roomId: input.roomId,
				scheduledStart: input.scheduledStart,
				scheduledEnd: input.scheduledEnd,
			})
			.onConflictDoNothing({ target: liveSessions.appointmentId })
			.returning();

		const created = inserted[0];
		if (created) return { session: created, created: true };

		const existing = await this.findByAppointmentId(input.appointmentId);
		if (!existing) {
			throw new Error(
				`Live session for appointment ${input.appointmentId} vanished after conflict`
			);
		}

		return { session: existing, created: false };
	}

	async findById(sessionId: string): Promise<LiveSession | null> {
		const rows = await this.db
			.select()
			.from(liveSessions)
			.where(eq(liveSessions.id, sessionId))
			.limit(1);

		return rows[0] ?? null;
	}

	async findByRoomId(roomId: string): Promise<LiveSession | null> {
		const rows = await this.db
			.select()
			.from(liveSessions)
			.where(eq(liveSessions.roomId, roomId))
			.limit(1);

		return rows[0] ?? null;
	}

	async findByAppointmentId(appointmentId: string): Promise<LiveSession | null> {
		const rows = await this.db
			.select()
			.from(liveSessions)
			.where(eq(liveSessions.appointmentId, appointmentId))
			.limit(1);

		return rows[0] ?? null;
	}

	async transitionStatus(input: StatusTransition): Promise<LiveSession | null> {
		const rows = await this.db
			.update(liveSessions)
			.set({
				status: input.to,
				updatedAt: input.at,
				...(input.actualStart ? { actualStart: input.actualStart } : {}),
				...(input.actualEnd ? { actualEnd: input.actualEnd } : {}),
			})
			.where(
				and(
					eq(liveSessions.id, input.sessionId),
					eq(liveSessions.status, input.from)
				)
			)
			.returning();

		return rows[0] ?? null;
	}

	async updateNotes(sessionId: string, notes: string): Promise<LiveSession | null> {
		const rows = await this.db
			.update(liveSessions)
			.set({ notes, updatedAt: new Date() })
			.where(eq(liveSessions.id, sessionId))
			.returning();

		return rows[0] ?? null;
	}

	async updateConsent(
		sessionId: string,
		consentGiven: boolean
	): Promise<LiveSession | null> {
		const rows = await this.db
			.update(liveSessions)
			.set({ consentGiven, updatedAt: new Date() })
			.where(eq(liveSessions.id, sessionId))
			.returning();

		return rows[0] ?? null;
	}

	async upsertParticipant(input: ParticipantJoin): Promise<SessionParticipant> {
		const rows = await this.db
			.insert(sessionParticipants)
			.values({
				sessionId: input.sessionId,
				userId: input.userId,
				username: input.username,
				role: input.role,
				joinedAt: input.joinedAt,
				leftAt: null,
			})
			.onConflictDoUpdate({
				target: [sessionParticipants.sessionId, sessionParticipants.userId],
				set: {
					username: input.username,
					role: input.role,
					joinedAt: input.joinedAt,
					leftAt: null,
				},
			})
			.returning();

		const row = rows[0];
		if (!row) {
			throw new Error("Participant upsert returned no row");
		}
		return row;
	}

	async markParticipantLeft(
		sessionId: string,
		userId: string,
		leftAt: Date
	): Promise<SessionParticipant | null> {
		const rows = await this.db
			.update(sessionParticipants)
			.set({ leftAt })
			.where(
				and(
					eq(sessionParticipants.sessionId, sessionId),
					eq(sessionParticipants.userId, userId)
				)
			)
			.returning();

		return rows[0] ?? null;
	}

	listConnectedParticipants(sessionId: string): Promise<SessionParticipant[]> {
		return this.db
			.select()
			.from(sessionParticipants)
			.where(
				and(
					eq(sessionParticipants.sessionId, sessionId),
					isNull(sessionParticipants.leftAt)
				)
			);
	}

	listParticipants(sessionId: string): Promise<SessionParticipant[]> {
		return this.db
			.select()
			.from(sessionParticipants)
			.where(eq(sessionParticipants.sessionId, sessionId))
			.orderBy(asc(sessionParticipants.joinedAt));
	}

	async appendMessage(input: MessageAppend): Promise<SessionMessage> {
		const rows = await this.db
			.insert(sessionMessages)
			.values({
				sessionId: input.sessionId,
				senderId: input.senderId,
				senderUsername: input.senderUsername,
				message: input.message,
				messageType: input.messageType,
				timestamp: input.timestamp,
			})
			.returning();

		const row = rows[0];
		if (!row) {
			throw new Error("Message insert returned no row");
		}
		return row;
	}

	listMessages(
		sessionId: string,
		opts: { limit: number }
	): Promise<SessionMessage[]> {
		return this.db
			.select()
			.from(sessionMessages)
			.where(eq(sessionMessages.sessionId, sessionId))
			.orderBy(asc(sessionMessages.timestamp), asc(sessionMessages.id))
			.limit(opts.limit);
	}
}
