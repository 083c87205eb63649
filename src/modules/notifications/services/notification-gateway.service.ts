import { inject, injectable } from "inversify";

import {
	RealtimeConnection,
	type ConnectionHandlers,
	type ConnectionIdentity,
	type RealtimeSocket,
} from "@/infra/realtime/realtimeConnection";
import { AuthenticationRequiredError } from "@/infra/realtime/realtime.errors";
import { REALTIME_TYPES } from "@/infra/realtime/realtime.types";
import { RealtimeHub } from "@/infra/realtime/realtimeHub";
import { topics } from "@/infra/realtime/topics";
import { rejectSocket } from "@/infra/realtime/wsSocket";
import type { LoggerLike } from "@/infra/observability";
import { UserFacingError } from "@/infra/userFacingError";

import { toPublicNotification } from "../notifications.dto";
import { NOTIFICATION_TYPES } from "../notifications.types";
import {
	NOTIFICATION_WS_CLIENT_FRAME_TYPES,
	NotificationWsClientFrameSchema,
	type NotificationWsClientFrame,
	type NotificationWsServerEvent,
} from "../notifications.ws.schemas";
import { NotificationDispatcher } from "./notification.dispatcher.service";

function readType(parsed: unknown): unknown {
	if (typeof parsed !== "object" || parsed === null) return undefined;
	return "type" in parsed ? parsed.type : undefined;
}

@injectable()
export class NotificationGateway {
	constructor(
		@inject(REALTIME_TYPES.RealtimeHub)
		private readonly hub: RealtimeHub,

		@inject(NOTIFICATION_TYPES.NotificationDispatcher)
		private readonly dispatcher: NotificationDispatcher
	) {}

	accept(input: {
		socket: RealtimeSocket;
		identity: ConnectionIdentity | null;
		log: LoggerLike;
	}): RealtimeConnection | null {
		if (!input.identity) {
			rejectSocket(input.socket, new AuthenticationRequiredError(), input.log);
			return null;
		}

		const conn = new RealtimeConnection(
			input.socket,
			input.identity,
			this.handlers(),
			input.log,
			"ws:notifications"
		);
		conn.start();
		return conn;
	}

	private handlers(): ConnectionHandlers {
		return {
			open: async (conn) => {
				const { userId } = conn.identity;
				this.hub.join(topics.notifications(userId), conn);

				const count = await this.dispatcher.unreadCount(userId);
				send(conn, { type: "notification_count", count });
			},

			frame: (conn, raw) => this.handleFrame(conn, raw),

			close: async (conn) => {
				this.hub.leaveAll(conn);
			},
		};
	}

	private async handleFrame(conn: RealtimeConnection, raw: string): Promise<void> {
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			send(conn, { type: "error", code: "INVALID_JSON", message: "Invalid JSON" });
			return;
		}

		const type = readType(parsed);
		if (!NOTIFICATION_WS_CLIENT_FRAME_TYPES.some((t) => t === type)) {
			send(conn, {
				type: "error",
				code: "UNKNOWN_TYPE",
				message: `Unknown message type: ${String(type)}`,
			});
			return;
		}

		const frame = NotificationWsClientFrameSchema.safeParse(parsed);
		if (!frame.success) {
			send(conn, {
				type: "error",
				code: "VALIDATION",
				message: frame.error.issues[0]?.message ?? "Invalid message payload",
			});
			return;
		}

		try {
			await this.dispatch(conn, frame.data);
		} catch (err) {
			if (err instanceof UserFacingError) {
				send(conn, { type: "error", code: err.code, message: err.userMessage });
				return;
			}
			throw err;
		}
	}

	private async dispatch(
		conn: RealtimeConnection,
		frame: NotificationWsClientFrame
	): Promise<void> {
		const { userId } = conn.identity;

		switch (frame.type) {
			case "ping":
				send(conn, { type: "pong" });
				return;

			case "mark_read":
				await this.dispatcher.markRead(frame.notification_id, userId);
				return;

			case "mark_all_read":
				await this.dispatcher.markAllRead(userId);
				return;

			case "dismiss":
				await this.dispatcher.dismiss(frame.notification_id, userId);
				return;

			case "get_notifications": {
				const [items, unread] = await Promise.all([
					this.dispatcher.listRecent(userId, frame.limit),
					this.dispatcher.unreadCount(userId),
				]);
				send(conn, {
					type: "notifications_list",
					notifications: items.map(toPublicNotification),
					unread_count: unread,
				});
				return;
			}
		}
	}
}

function send(conn: RealtimeConnection, event: NotificationWsServerEvent): void {
	conn.sendEvent(event);
}
