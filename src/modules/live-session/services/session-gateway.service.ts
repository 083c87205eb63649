import { inject, injectable } from "inversify";

import {
	RealtimeConnection,
	type ConnectionHandlers,
	type ConnectionIdentity,
	type RealtimeSocket,
} from "@/infra/realtime/realtimeConnection";
import {
	AccessDeniedError,
	AuthenticationRequiredError,
	RealtimeError,
	RealtimeNotFoundError,
	closeCodeFor,
} from "@/infra/realtime/realtime.errors";
import { KeyedLock } from "@/infra/realtime/keyedLock";
import { REALTIME_TYPES } from "@/infra/realtime/realtime.types";
import { RealtimeHub } from "@/infra/realtime/realtimeHub";
import { topics } from "@/infra/realtime/topics";
import type { LoggerLike } from "@/infra/observability";
import { rejectSocket } from "@/infra/realtime/wsSocket";

import type { LiveSession, ParticipantRole } from "../live-session.dto";
import { resolveRole, isParty } from "../live-session.roles";
import { LIVE_SESSION_TYPES } from "../live-session.types";
import type {
	LiveSessionRepositoryPort,
	ParticipantJoin,
} from "../persistence/live-session.repository.port";
import { SessionCoordinator } from "./session-coordinator.service";
import { SessionRelayService, type SessionChannel } from "./session-relay.service";

export type SessionConnectRequest = {
	socket: RealtimeSocket;
	roomId: string;
	identity: ConnectionIdentity | null;
	channel: SessionChannel;
	log: LoggerLike;
};

type Admission = {
	session: LiveSession;
	role: ParticipantRole;
};

const presenceKey = (sessionId: string, userId: string) =>
	`presence:${sessionId}:${userId}`;

/**
 * Connection lifecycle for session rooms: admission, participant tracking,
 * frame relay and exactly-once cleanup.
 *
 * A user may hold several sockets on one session (live and chat routes, extra
 * tabs). Presence is counted per (session, user): the participant row is
 * re-upserted on every join and marked left only when the last socket closes.
 */
@injectable()
export class SessionGateway {
	private readonly openConnections = new Map<string, number>();

	constructor(
		@inject(LIVE_SESSION_TYPES.LiveSessionRepository)
		private readonly repo: LiveSessionRepositoryPort,

		@inject(REALTIME_TYPES.RealtimeHub)
		private readonly hub: RealtimeHub,

		@inject(LIVE_SESSION_TYPES.SessionCoordinator)
		private readonly coordinator: SessionCoordinator,

		@inject(LIVE_SESSION_TYPES.SessionRelayService)
		private readonly relay: SessionRelayService,

		@inject(REALTIME_TYPES.KeyedLock)
		private readonly lock: KeyedLock
	) {}

	/**
	 * Listeners are attached before any await, so frames sent right after the
	 * handshake queue up behind admission instead of getting lost.
	 */
	accept(req: SessionConnectRequest): RealtimeConnection | null {
		if (!req.identity) {
			rejectSocket(req.socket, new AuthenticationRequiredError(), req.log);
			return null;
		}

		const conn = new RealtimeConnection(
			req.socket,
			req.identity,
			this.handlersFor(req.roomId, req.channel),
			req.log,
			`ws:${req.channel}`
		);
		conn.start();
		return conn;
	}

	async admit(roomId: string, userId: string): Promise<Admission> {
		const session = await this.repo.findByRoomId(roomId);
		if (!session) {
			throw new RealtimeNotFoundError("Session not found", { roomId });
		}

		const role = resolveRole(session, userId);
		if (!isParty(role)) {
			throw new AccessDeniedError("Access denied", { roomId });
		}

		return { session, role };
	}

	/** Returns true when this is the user's first open socket on the session. */
	private async enter(
		key: string,
		join: ParticipantJoin
	): Promise<boolean> {
		return this.lock.run(key, async () => {
			await this.repo.upsertParticipant(join);
			const count = (this.openConnections.get(key) ?? 0) + 1;
			this.openConnections.set(key, count);
			return count === 1;
		});
	}

	/** Returns true when the user's last open socket on the session closed. */
	private async exit(key: string, sessionId: string, userId: string): Promise<boolean> {
		return this.lock.run(key, async () => {
			const count = (this.openConnections.get(key) ?? 1) - 1;
			if (count > 0) {
				this.openConnections.set(key, count);
				return false;
			}
			this.openConnections.delete(key);
			await this.coordinator.onParticipantLeft(sessionId, userId);
			return true;
		});
	}

	private handlersFor(roomId: string, channel: SessionChannel): ConnectionHandlers {
		// per-connection state; populated once admission succeeds
		let admitted: Admission | null = null;
		let present: string | null = null;

		const topic =
			channel === "live" ? topics.liveSession(roomId) : topics.chat(roomId);

		return {
			open: async (conn) => {
				const { userId, username } = conn.identity;

				let admission: Admission;
				try {
					admission = await this.admit(roomId, userId);
				} catch (err) {
					if (err instanceof RealtimeError) {
						conn.sendEvent({ type: "error", code: err.code, message: err.message });
						conn.close(closeCodeFor(err), err.code);
						return;
					}
					throw err;
				}
				admitted = admission;
				const { session, role } = admission;

				this.hub.join(topic, conn);

				const key = presenceKey(session.id, userId);
				const first = await this.enter(key, {
					sessionId: session.id,
					userId,
					username,
					role,
					joinedAt: new Date(),
				});
				present = key;

				if (first) {
					this.coordinator.broadcastToRoom(session.roomId, {
						type: "user_joined",
						user_id: userId,
						username,
						role,
					});
				}

				conn.sendEvent({
					type: "session_state",
					room_id: session.roomId,
					status: session.status,
					session_type: session.sessionType,
					role,
				});

				const updated = await this.coordinator.onParticipantJoined(
					session.id,
					conn.log
				);
				if (updated) admitted = { session: updated, role };

				conn.log.info(
					{ roomId, role, status: updated?.status ?? session.status },
					"joined session room"
				);
			},

			frame: async (conn, raw) => {
				if (!admitted) return;
				await this.relay.handleFrame(
					{ sender: conn, session: admitted.session, channel },
					raw
				);
			},

			close: async (conn) => {
				const { userId, username } = conn.identity;
				let lastOut = false;
				try {
					if (admitted && present) {
						lastOut = await this.exit(present, admitted.session.id, userId);
					}
				} finally {
					this.hub.leaveAll(conn);
					if (admitted && lastOut) {
						this.coordinator.broadcastToRoom(admitted.session.roomId, {
							type: "user_left",
							user_id: userId,
							username,
						});
					}
				}
			},
		};
	}
}
