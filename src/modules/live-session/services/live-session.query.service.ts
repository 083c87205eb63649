import { inject, injectable } from "inversify";

import { UserFacingError } from "@/infra/userFacingError";

import type {
	LiveSession,
	SessionMessage,
	SessionParticipant,
} from "../live-session.dto";
import { resolveRole, isParty } from "../live-session.roles";
import type { LiveSessionSettings } from "../live-session.settings";
import { LIVE_SESSION_TYPES } from "../live-session.types";
import type { LiveSessionRepositoryPort } from "../persistence/live-session.repository.port";

@injectable()
export class LiveSessionQueryService {
	constructor(
		@inject(LIVE_SESSION_TYPES.LiveSessionRepository)
		private readonly repo: LiveSessionRepositoryPort,

		@inject(LIVE_SESSION_TYPES.LiveSessionSettings)
		private readonly settings: LiveSessionSettings
	) {}

	async getForParty(
		requesterId: string,
		roomId: string
	): Promise<{ session: LiveSession; participants: SessionParticipant[] }> {
		const session = await this.requirePartySession(requesterId, roomId);
		const participants = await this.repo.listParticipants(session.id);
		return { session, participants };
	}

	async listMessages(
		requesterId: string,
		roomId: string,
		limit?: number
	): Promise<SessionMessage[]> {
		const session = await this.requirePartySession(requesterId, roomId);
		const max = this.settings.messageHistoryLimit;
		return this.repo.listMessages(session.id, {
			limit: Math.min(limit ?? max, max),
		});
	}

	private async requirePartySession(
		requesterId: string,
		roomId: string
	): Promise<LiveSession> {
		const session = await this.repo.findByRoomId(roomId);
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
}
