import { inject, injectable } from "inversify";

import { APPOINTMENTS_TYPES } from "@/capabilities/appointments/appointments.types";
import type { AppointmentsGateway } from "@/capabilities/appointments/appointments.dto";
import { KeyedLock } from "@/infra/realtime/keyedLock";
import { REALTIME_TYPES } from "@/infra/realtime/realtime.types";
import { RealtimeHub } from "@/infra/realtime/realtimeHub";
import { topics } from "@/infra/realtime/topics";
import type { LoggerLike } from "@/infra/observability";
import { ensureLogger, errorMessage } from "@/infra/observability";
import { UserFacingError } from "@/infra/userFacingError";

import type {
	LiveSession,
	LiveSessionStatus,
	SessionParticipant,
} from "../live-session.dto";
import { canTransition, isTerminal } from "../live-session.lifecycle";
import { isParty, resolveRole } from "../live-session.roles";
import { LIVE_SESSION_TYPES } from "../live-session.types";
import type { SessionWsServerEvent } from "../live-session.ws.schemas";
import type {
	LiveSessionRepositoryPort,
	StatusTransition,
} from "../persistence/live-session.repository.port";

type TerminalMove = {
	to: Extract<LiveSessionStatus, "completed" | "cancelled" | "no_show">;
	conflictCode: string;
	conflictMessage: string;
};

/**
 * Owns every status change of a live session. All moves for one session run
 * under a per-session lock and land through a compare-and-set on the stored
 * status, so only one caller ever observes a given transition as its own.
 */
@injectable()
export class SessionCoordinator {
	constructor(
		@inject(LIVE_SESSION_TYPES.LiveSessionRepository)
		private readonly repo: LiveSessionRepositoryPort,

		@inject(REALTIME_TYPES.RealtimeHub)
		private readonly hub: RealtimeHub,

		@inject(REALTIME_TYPES.KeyedLock)
		private readonly lock: KeyedLock,

		@inject(APPOINTMENTS_TYPES.AppointmentsGateway)
		private readonly appointments: AppointmentsGateway
	) {}

	/**
	 * Called after a participant row was upserted for a live connection.
	 * scheduled -> waiting on the first join; waiting -> active once a student
	 * and a counselor are connected at the same time.
	 */
	async onParticipantJoined(
		sessionId: string,
		log?: LoggerLike
	): Promise<LiveSession | null> {
		const lg = ensureLogger(log);

		return this.lock.run(sessionId, async () => {
			let current = await this.repo.findById(sessionId);
			if (!current) return null;
			if (isTerminal(current.status)) return current;

			if (current.status === "scheduled") {
				current = await this.compareAndSet(current, {
					to: "waiting",
				});
				lg.info(
					{ sessionId, status: current.status },
					"live session waiting for parties"
				);
			}

			if (current.status !== "waiting") return current;

			const connected = await this.repo.listConnectedParticipants(sessionId);
			const roles = new Set(connected.map((p) => p.role));
			if (!roles.has("student") || !roles.has("counselor")) return current;

			const startedAt = new Date();
			const activated = await this.repo.transitionStatus({
				sessionId,
				from: "waiting",
				to: "active",
				at: startedAt,
				actualStart: startedAt,
			});

			// lost the race: someone else moved it, they own the broadcast
			if (!activated) {
				return (await this.repo.findById(sessionId)) ?? current;
			}

			lg.info({ sessionId, roomId: activated.roomId }, "live session started");
			this.broadcastToRoom(activated.roomId, {
				type: "session_started",
				status: "active",
				started_at: startedAt.toISOString(),
			});

			return activated;
		});
	}

	/** Leave hook: records `left_at`, never touches status. */
	onParticipantLeft(
		sessionId: string,
		userId: string
	): Promise<SessionParticipant | null> {
		return this.repo.markParticipantLeft(sessionId, userId, new Date());
	}

	/**
	 * active -> completed. Terminal sessions are returned unchanged.
	 */
	async endSession(
		roomId: string,
		requesterId: string,
		log?: LoggerLike
	): Promise<LiveSession> {
		const lg = ensureLogger(log);
		const session = await this.requirePartySession(
			await this.repo.findByRoomId(roomId),
			requesterId
		);

		const { session: ended, changed } = await this.finish(session, {
			to: "completed",
			conflictCode: "SESSION_NOT_ACTIVE",
			conflictMessage: "Session is not active.",
		});
		if (!changed) return ended;

		try {
			await this.appointments.markCompleted(ended.appointmentId);
		} catch (err) {
			lg.error(
				{ sessionId: ended.id, appointmentId: ended.appointmentId, err: errorMessage(err) },
				"failed to mark appointment completed"
			);
		}

		const endedAt = ended.actualEnd ?? ended.updatedAt;
		this.broadcastToRoom(ended.roomId, {
			type: "session_ended",
			status: "completed",
			ended_at: endedAt.toISOString(),
		});
		lg.info({ sessionId: ended.id }, "live session ended");

		return ended;
	}

	/**
	 * scheduled|waiting -> cancelled, triggered by the appointment being
	 * cancelled upstream.
	 */
	async cancelForAppointment(
		appointmentId: string,
		requesterId: string
	): Promise<LiveSession> {
		const session = await this.requirePartySession(
			await this.repo.findByAppointmentId(appointmentId),
			requesterId
		);

		const { session: cancelled } = await this.finish(session, {
			to: "cancelled",
			conflictCode: "SESSION_NOT_CANCELLABLE",
			conflictMessage: "Session has already started and cannot be cancelled.",
		});
		return cancelled;
	}

	/** active -> no_show. */
	async markNoShow(
		appointmentId: string,
		requesterId: string
	): Promise<LiveSession> {
		const session = await this.requirePartySession(
			await this.repo.findByAppointmentId(appointmentId),
			requesterId
		);

		const { session: marked } = await this.finish(session, {
			to: "no_show",
			conflictCode: "INVALID_SESSION_TRANSITION",
			conflictMessage: `Cannot mark a ${session.status} session as no-show.`,
		});
		return marked;
	}

	broadcastToRoom(roomId: string, event: SessionWsServerEvent): void {
		for (const topic of topics.sessionRoom(roomId)) {
			this.hub.broadcast(topic, event);
		}
	}

	private async requirePartySession(
		session: LiveSession | null,
		requesterId: string
	): Promise<LiveSession> {
		if (!session) {
			throw new UserFacingError({
				code: "SESSION_NOT_FOUND",
				userMessage: "Live session not found.",
				statusCode: 404,
			});
		}

		if (!isParty(resolveRole(session, requesterId))) {
			throw new UserFacingError({
				code: "FORBIDDEN",
				userMessage: "You are not a party to this session.",
				statusCode: 403,
			});
		}

		return session;
	}

	private finish(
		session: LiveSession,
		move: TerminalMove
	): Promise<{ session: LiveSession; changed: boolean }> {
		return this.lock.run(session.id, async () => {
			const current = (await this.repo.findById(session.id)) ?? session;
			if (isTerminal(current.status)) {
				return { session: current, changed: false };
			}

			if (!canTransition(current.status, move.to)) {
				throw new UserFacingError({
					code: move.conflictCode,
					userMessage: move.conflictMessage,
					statusCode: 409,
					details: { status: current.status, requested: move.to },
				});
			}

			const at = new Date();
			const next = await this.repo.transitionStatus({
				sessionId: current.id,
				from: current.status,
				to: move.to,
				at,
				actualEnd: move.to === "completed" ? at : undefined,
			});

			if (next) return { session: next, changed: true };

			// moved by another process between read and write
			const latest = (await this.repo.findById(session.id)) ?? current;
			if (isTerminal(latest.status)) {
				return { session: latest, changed: false };
			}
			throw new UserFacingError({
				code: move.conflictCode,
				userMessage: move.conflictMessage,
				statusCode: 409,
				details: { status: latest.status, requested: move.to },
			});
		});
	}

	private async compareAndSet(
		current: LiveSession,
		move: Pick<StatusTransition, "to" | "actualStart">
	): Promise<LiveSession> {
		const next = await this.repo.transitionStatus({
			sessionId: current.id,
			from: current.status,
			to: move.to,
			at: new Date(),
			actualStart: move.actualStart,
		});
		return next ?? (await this.repo.findById(current.id)) ?? current;
	}
}
