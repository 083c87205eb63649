import { inject, injectable } from "inversify";

import { REALTIME_TYPES } from "@/infra/realtime/realtime.types";
import { RealtimeHub } from "@/infra/realtime/realtimeHub";
import { topics } from "@/infra/realtime/topics";
import type { LoggerLike } from "@/infra/observability";
import { safePreview } from "@/infra/observability";

import type { LiveSession } from "../live-session.dto";
import { LIVE_SESSION_TYPES } from "../live-session.types";
import {
	SESSION_WS_CLIENT_FRAME_TYPES,
	SessionWsClientFrameSchema,
	type SessionWsClientFrame,
	type SessionWsServerEvent,
} from "../live-session.ws.schemas";
import type { LiveSessionRepositoryPort } from "../persistence/live-session.repository.port";

export type SessionChannel = "live" | "chat";

export type RelaySender = {
	readonly identity: { userId: string; username: string };
	readonly log: LoggerLike;
	sendEvent(event: SessionWsServerEvent): void;
};

export type RelayContext = {
	sender: RelaySender;
	session: Pick<LiveSession, "id" | "roomId">;
	channel: SessionChannel;
};

function isKnownFrameType(value: unknown): boolean {
	return SESSION_WS_CLIENT_FRAME_TYPES.some((t) => t === value);
}

function readType(parsed: unknown): unknown {
	if (typeof parsed !== "object" || parsed === null) return undefined;
	return "type" in parsed ? parsed.type : undefined;
}

/**
 * Validates inbound room frames and fans them out. Rejections are answered to
 * the sender only; the connection stays open.
 */
@injectable()
export class SessionRelayService {
	constructor(
		@inject(LIVE_SESSION_TYPES.LiveSessionRepository)
		private readonly repo: LiveSessionRepositoryPort,

		@inject(REALTIME_TYPES.RealtimeHub)
		private readonly hub: RealtimeHub
	) {}

	async handleFrame(ctx: RelayContext, raw: string): Promise<void> {
		const { sender } = ctx;

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			sender.sendEvent({
				type: "error",
				code: "INVALID_JSON",
				message: "Invalid JSON",
			});
			return;
		}

		const type = readType(parsed);
		if (!isKnownFrameType(type)) {
			sender.sendEvent({
				type: "error",
				code: "UNKNOWN_TYPE",
				message: `Unknown message type: ${String(type)}`,
			});
			return;
		}

		const frame = SessionWsClientFrameSchema.safeParse(parsed);
		if (!frame.success) {
			sender.sendEvent({
				type: "error",
				code: "VALIDATION",
				message: frame.error.issues[0]?.message ?? "Invalid message payload",
			});
			return;
		}

		await this.dispatch(ctx, frame.data);
	}

	private async dispatch(
		ctx: RelayContext,
		frame: SessionWsClientFrame
	): Promise<void> {
		const { sender, session } = ctx;

		switch (frame.type) {
			case "ping":
				sender.sendEvent({ type: "pong" });
				return;

			case "webrtc_signal": {
				if (ctx.channel === "chat") {
					sender.sendEvent({
						type: "error",
						code: "UNSUPPORTED",
						message: "Signaling is not available on chat rooms",
					});
					return;
				}

				this.hub.broadcast(topics.liveSession(session.roomId), {
					type: "webrtc_signal",
					signal: frame.signal,
					sender: sender.identity.userId,
					...(frame.target ? { target: frame.target } : {}),
				} satisfies SessionWsServerEvent);
				return;
			}

			case "chat_message": {
				const stored = await this.repo.appendMessage({
					sessionId: session.id,
					senderId: sender.identity.userId,
					senderUsername: sender.identity.username,
					message: frame.message,
					messageType: "text",
					timestamp: new Date(),
				});

				sender.log.debug(
					{ sessionId: session.id, preview: safePreview(stored.message, 40) },
					"chat message stored"
				);

				const event: SessionWsServerEvent = {
					type: "chat_message",
					message: stored.message,
					sender: stored.senderUsername,
					sender_id: stored.senderId,
					timestamp: stored.timestamp.toISOString(),
				};
				for (const topic of topics.sessionRoom(session.roomId)) {
					this.hub.broadcast(topic, event);
				}
				return;
			}
		}
	}
}
