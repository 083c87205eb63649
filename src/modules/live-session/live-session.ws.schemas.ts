import { z } from "zod";

import type { LiveSessionKind, LiveSessionStatus, ParticipantRole } from "./live-session.dto";

export const CHAT_MESSAGE_MAX_LENGTH = 4000;

const WebRtcSignalSchema = z
	.object({
		type: z.string().trim().min(1, "Signal type is required."),
	})
	.catchall(z.unknown());

/**
 * Client -> Server frames on a session room.
 */
export const SessionWsClientFrameSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("ping"),
	}),

	z.object({
		type: z.literal("webrtc_signal"),
		signal: WebRtcSignalSchema,
		target: z.string().min(1).optional(),
	}),

	z.object({
		type: z.literal("chat_message"),
		message: z
			.string()
			.trim()
			.min(1, "Message cannot be empty.")
			.max(CHAT_MESSAGE_MAX_LENGTH, "Message is too long."),
	}),
]);

export type SessionWsClientFrame = z.infer<typeof SessionWsClientFrameSchema>;
export type SessionWsClientFrameType = SessionWsClientFrame["type"];

export const SESSION_WS_CLIENT_FRAME_TYPES: readonly SessionWsClientFrameType[] = [
	"ping",
	"webrtc_signal",
	"chat_message",
];

/**
 * Server -> Client events.
 */
export type SessionWsServerEvent =
	| {
			type: "session_state";
			room_id: string;
			status: LiveSessionStatus;
			session_type: LiveSessionKind;
			role: ParticipantRole;
	  }
	| {
			type: "user_joined";
			user_id: string;
			username: string;
			role: ParticipantRole;
	  }
	| { type: "user_left"; user_id: string; username: string }
	| { type: "session_started"; status: "active"; started_at: string }
	| { type: "session_ended"; status: "completed"; ended_at: string }
	| {
			type: "webrtc_signal";
			signal: Record<string, unknown>;
			sender: string;
			target?: string;
	  }
	| {
			type: "chat_message";
			message: string;
			sender: string;
			sender_id: string;
			timestamp: string;
	  }
	| { type: "pong" }
	| { type: "error"; code: string; message: string };
