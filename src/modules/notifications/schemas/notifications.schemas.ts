import { z } from "zod";

import { NOTIFICATION_PRIORITIES } from "../notifications.dto";

export const NotificationParamsSchema = z.object({
	id: z.uuid(),
});

export const ListNotificationsQuerySchema = z.object({
	limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const CreateNotificationSchema = z.object({
	userId: z.string().trim().min(1).max(64),
	message: z.string().trim().min(1).max(2000),
	type: z.string().trim().min(1).max(20).optional(),
	priority: z.enum(NOTIFICATION_PRIORITIES).optional(),
	actionUrl: z.string().trim().min(1).max(500).nullish(),
	actionText: z.string().trim().min(1).max(50).nullish(),
	expiresInHours: z.number().int().min(1).max(24 * 365).nullish(),
	metadata: z.record(z.string(), z.unknown()).optional(),
});

export type CreateNotificationBody = z.infer<typeof CreateNotificationSchema>;
