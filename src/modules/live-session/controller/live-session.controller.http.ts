import type { FastifyInstance } from "fastify";

import { requireRequestUserId } from "@/infra/auth/requestUser";

import {
	toPublicMessage,
	toPublicParticipant,
	toPublicSession,
} from "../live-session.dto";
import {
	AppointmentParamsSchema,
	CreateLiveSessionSchema,
	MessageHistoryQuerySchema,
	RoomParamsSchema,
	UpdateConsentSchema,
	UpdateNotesSchema,
} from "../schemas/live-session.schemas";
import type { LiveSessionControllerDeps } from "./live-session.controller.types";

export function registerLiveSessionHttpRoutes(
	app: FastifyInstance,
	deps: LiveSessionControllerDeps
): void {
	registerSessionRoutes(app, deps);
	registerLifecycleRoutes(app, deps);
}

function registerSessionRoutes(
	app: FastifyInstance,
	deps: LiveSessionControllerDeps
): void {
	app.post("/live-sessions", async (req, reply) => {
		const userId = requireRequestUserId(req);
		const dto = CreateLiveSessionSchema.parse(req.body);

		const { session, created } = await deps.commandService.createForAppointment(
			userId,
			dto
		);

		return reply.code(created ? 201 : 200).send(toPublicSession(session));
	});

	app.get("/live-sessions/:roomId", async (req) => {
		const userId = requireRequestUserId(req);
		const { roomId } = RoomParamsSchema.parse(req.params);

		const { session, participants } = await deps.queryService.getForParty(
			userId,
			roomId
		);
		return {
			...toPublicSession(session),
			participants: participants.map(toPublicParticipant),
		};
	});

	app.get("/live-sessions/:roomId/messages", async (req) => {
		const userId = requireRequestUserId(req);
		const { roomId } = RoomParamsSchema.parse(req.params);
		const q = MessageHistoryQuerySchema.parse(req.query);

		const messages = await deps.queryService.listMessages(userId, roomId, q.limit);
		return { messages: messages.map(toPublicMessage) };
	});

	app.patch("/live-sessions/:roomId/notes", async (req) => {
		const userId = requireRequestUserId(req);
		const { roomId } = RoomParamsSchema.parse(req.params);
		const dto = UpdateNotesSchema.parse(req.body);

		const session = await deps.commandService.updateNotes(userId, roomId, dto.notes);
		return toPublicSession(session);
	});

	app.patch("/live-sessions/:roomId/consent", async (req) => {
		const userId = requireRequestUserId(req);
		const { roomId } = RoomParamsSchema.parse(req.params);
		const dto = UpdateConsentSchema.parse(req.body);

		const session = await deps.commandService.updateConsent(
			userId,
			roomId,
			dto.consentGiven
		);
		return toPublicSession(session);
	});
}

function registerLifecycleRoutes(
	app: FastifyInstance,
	deps: LiveSessionControllerDeps
): void {
	app.post("/live-sessions/:roomId/end", async (req) => {
		const userId = requireRequestUserId(req);
		const { roomId } = RoomParamsSchema.parse(req.params);

		const session = await deps.coordinator.endSession(roomId, userId, req.log);
		return toPublicSession(session);
	});

	app.post("/live-sessions/appointments/:appointmentId/cancel", async (req) => {
		const userId = requireRequestUserId(req);
		const { appointmentId } = AppointmentParamsSchema.parse(req.params);

		const session = await deps.coordinator.cancelForAppointment(
			appointmentId,
			userId
		);
		return toPublicSession(session);
	});

	app.post("/live-sessions/appointments/:appointmentId/no-show", async (req) => {
		const userId = requireRequestUserId(req);
		const { appointmentId } = AppointmentParamsSchema.parse(req.params);

		const session = await deps.coordinator.markNoShow(appointmentId, userId);
		return toPublicSession(session);
	});
}
