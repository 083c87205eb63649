import { z } from "zod";

import { LIVE_SESSION_KINDS } from "../live-session.dto";

export const RoomParamsSchema = z.object({
	roomId: z.string().trim().min(1),
});

export const AppointmentParamsSchema = z.object({
	appointmentId: z.uuid(),
});

/** Parties and schedule come from the booking service, never from the body. */
export const CreateLiveSessionSchema = z.object({
	appointmentId: z.uuid(),
	sessionType: z.enum(LIVE_SESSION_KINDS).optional(),
});

export const UpdateNotesSchema = z.object({
	notes: z.string().max(20_000),
});

export const UpdateConsentSchema = z.object({
	consentGiven: z.boolean(),
});

export const MessageHistoryQuerySchema = z.object({
	limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type CreateLiveSessionBody = z.infer<typeof CreateLiveSessionSchema>;
