import { randomBytes } from "node:crypto";
import { inject, injectable } from "inversify";

import type { AppointmentsGateway } from "@/capabilities/appointments/appointments.dto";
import { APPOINTMENTS_TYPES } from "@/capabilities/appointments/appointments.types";
import { UserFacingError } from "@/infra/userFacingError";

import {
	LIVE_SESSION_KINDS,
	type CreateLiveSessionInput,
	type CreateLiveSessionResult,
	type LiveSession,
	type LiveSessionKind,
} from "../live-session.dto";
import { resolveRole, isParty } from "../live-session.roles";
import type { LiveSessionSettings } from "../live-session.settings";
import { LIVE_SESSION_TYPES } from "../live-session.types";
import type { LiveSessionRepositoryPort } from "../persistence/live-session.repository.port";

export function generateRoomId(): string {
	return `session_${randomBytes(6).toString("hex")}`;
}

function toSessionKind(value: string | null): LiveSessionKind | undefined {
	return LIVE_SESSION_KINDS.find((k) => k === value);
}

@injectable()
export class LiveSessionCommandService {
	constructor(
		@inject(LIVE_SESSION_TYPES.LiveSessionRepository)
		private readonly repo: LiveSessionRepositoryPort,

		@inject(LIVE_SESSION_TYPES.LiveSessionSettings)
		private readonly settings: LiveSessionSettings,

		@inject(APPOINTMENTS_TYPES.AppointmentsGateway)
		private readonly appointments: AppointmentsGateway
	) {}

	/**
	 * Idempotent per appointment: a second call returns the existing session.
	 * Parties are read from the booking service.
	 */
	async createForAppointment(
		requesterId: string,
		input: CreateLiveSessionInput
	): Promise<CreateLiveSessionResult> {
		const appointment = await this.appointments.getAppointment(input.appointmentId);

		if (appointment.studentId === appointment.counselorId) {
			throw new UserFacingError({
				code: "INVALID_APPOINTMENT",
				userMessage: "Student and counselor must be different users.",
			});
		}

		if (!isParty(resolveRole(appointment, requesterId))) {
			throw new UserFacingError({
				code: "FORBIDDEN",
				userMessage: "Only the student or counselor can open a live session.",
				statusCode: 403,
			});
		}

		const scheduledEnd = new Date(
			appointment.scheduledStart.getTime() +
				this.settings.defaultDurationMinutes * 60_000
		);

		const result = await this.repo.createIfAbsent({
			appointmentId: appointment.id,
			studentId: appointment.studentId,
			counselorId: appointment.counselorId,
			observerIds: appointment.observerIds,
			sessionType:
				input.sessionType ?? toSessionKind(appointment.sessionType) ?? "video",
			roomId: generateRoomId(),
			scheduledStart: appointment.scheduledStart,
			scheduledEnd,
		});

		// existing row may carry a different party snapshot
		if (!result.created && !isParty(resolveRole(result.session, requesterId))) {
			throw new UserFacingError({
				code: "FORBIDDEN",
				userMessage: "You are not a party to this session.",
				statusCode: 403,
			});
		}

		return result;
	}

	async updateNotes(
		requesterId: string,
		roomId: string,
		notes: string
	): Promise<LiveSession> {
		const session = await this.requireSession(roomId);
		if (resolveRole(session, requesterId) !== "counselor") {
			throw new UserFacingError({
				code: "FORBIDDEN",
				userMessage: "Only the counselor can edit session notes.",
				statusCode: 403,
			});
		}

		const updated = await this.repo.updateNotes(session.id, notes);
		return updated ?? session;
	}

	async updateConsent(
		requesterId: string,
		roomId: string,
		consentGiven: boolean
	): Promise<LiveSession> {
		const session = await this.requireSession(roomId);
		if (resolveRole(session, requesterId) !== "student") {
			throw new UserFacingError({
				code: "FORBIDDEN",
				userMessage: "Only the student can record consent.",
				statusCode: 403,
			});
		}

		const updated = await this.repo.updateConsent(session.id, consentGiven);
		return updated ?? session;
	}

	private async requireSession(roomId: string): Promise<LiveSession> {
		const session = await this.repo.findByRoomId(roomId);
		if (!session) {
			throw new UserFacingError({
				code: "SESSION_NOT_FOUND",
				userMessage: "Live session not found.",
				statusCode: 404,
			});
		}
		return session;
	}
}
