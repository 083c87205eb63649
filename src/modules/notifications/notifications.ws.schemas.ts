import { z } from "zod";

import type { PublicNotification } from "./notifications.dto";

/**
 * Client -> Server frames on the personal notification stream.
 */
export const NotificationWsClientFrameSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("ping") }),
	z.object({ type: z.literal("mark_read"), notification_id: z.uuid() }),
	z.object({ type: z.literal("mark_all_read") }),
	z.object({ type: z.literal("dismiss"), notification_id: z.uuid() }),
	z.object({
		type: z.literal("get_notifications"),
		limit: z.number().int().min(1).max(100).optional(),
	}),
]);

export type NotificationWsClientFrame = z.infer<
	typeof NotificationWsClientFrameSchema
>;

export const NOTIFICATION_WS_CLIENT_FRAME_TYPES: readonly NotificationWsClientFrame["type"][] =
	["ping", "mark_read", "mark_all_read", "dismiss", "get_notifications"];

export type NotificationWsServerEvent =
	| { type: "new_notification"; notification: PublicNotification }
	| { type: "notification_count"; count: number }
	| {
			type: "notifications_list";
			notifications: PublicNotification[];
			unread_count: number;
	  }
	| { type: "pong" }
	| { type: "error"; code: string; message: string };
