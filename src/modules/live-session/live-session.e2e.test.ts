import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildServer } from "@/server";
import {
	APPOINTMENT,
	COUNSELOR,
	OUTSIDER,
	STUDENT,
	bearer,
	createTestContext,
	type TestContext,
} from "@/test/testApp";

import type { PublicSession } from "./live-session.dto";

const createBody = {
	appointmentId: APPOINTMENT.id,
	sessionType: "audio",
};

describe("Live session HTTP API", () => {
	let ctx: TestContext;
	let app: FastifyInstance;

	beforeEach(async () => {
		ctx = createTestContext();
		const server = await buildServer({ env: ctx.env, container: ctx.container });
		app = server.app;
		await app.ready();
	});

	afterEach(async () => {
		await app.close();
	});

	async function createSession(): Promise<PublicSession> {
		const res = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(STUDENT),
			payload: createBody,
		});
		expect(res.statusCode).toBe(201);
		return res.json<PublicSession>();
	}

	it("serves /health without a token", async () => {
		const res = await app.inject({ method: "GET", url: "/health" });

		expect(res.statusCode).toBe(200);
		expect(res.json()).toEqual({ status: "ok" });
	});

	it("rejects requests without a token", async () => {
		const res = await app.inject({
			method: "POST",
			url: "/live-sessions",
			payload: createBody,
		});

		expect(res.statusCode).toBe(401);
	});

	it("creates once per appointment and returns the same room afterwards", async () => {
		const first = await createSession();

		expect(first.roomId).toMatch(/^session_[0-9a-f]{12}$/);
		expect(first.status).toBe("scheduled");
		expect(first.sessionType).toBe("audio");
		expect(first.scheduledEnd).toBe("2026-03-02T15:30:00.000Z");

		const second = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(COUNSELOR),
			payload: createBody,
		});

		expect(second.statusCode).toBe(200);
		expect(second.json<PublicSession>().roomId).toBe(first.roomId);
		expect(ctx.liveSessions.sessions.size).toBe(1);
	});

	it("refuses creation by someone outside the appointment", async () => {
		const res = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(OUTSIDER),
			payload: createBody,
		});

		expect(res.statusCode).toBe(403);
		expect(res.json()).toMatchObject({ code: "FORBIDDEN" });
	});

	it("takes the parties from the booking service, not from the body", async () => {
		const forged = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(OUTSIDER),
			payload: {
				appointmentId: APPOINTMENT.id,
				appointment: {
					id: APPOINTMENT.id,
					studentId: OUTSIDER.id,
					counselorId: COUNSELOR.id,
					scheduledStart: "2026-03-02T14:30:00.000Z",
				},
			},
		});
		expect(forged.statusCode).toBe(403);
		expect(ctx.liveSessions.sessions.size).toBe(0);

		const real = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(STUDENT),
			payload: { appointmentId: APPOINTMENT.id },
		});
		expect(real.statusCode).toBe(201);
		expect(real.json<PublicSession>()).toMatchObject({
			studentId: STUDENT.id,
			counselorId: COUNSELOR.id,
			sessionType: "video",
		});
	});

	it("answers 404 for an appointment the booking service does not know", async () => {
		const res = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(STUDENT),
			payload: { appointmentId: "bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb" },
		});

		expect(res.statusCode).toBe(404);
		expect(res.json()).toMatchObject({ code: "APPOINTMENT_NOT_FOUND" });
	});

	it("validates the body", async () => {
		const res = await app.inject({
			method: "POST",
			url: "/live-sessions",
			headers: bearer(STUDENT),
			payload: { appointmentId: "not-a-uuid" },
		});

		expect(res.statusCode).toBe(400);
		expect(res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
	});

	it("shows the session with participants to parties only", async () => {
		const { roomId } = await createSession();

		const ok = await app.inject({
			method: "GET",
			url: `/live-sessions/${roomId}`,
			headers: bearer(COUNSELOR),
		});
		expect(ok.statusCode).toBe(200);
		expect(ok.json()).toMatchObject({ roomId, participants: [] });

		const denied = await app.inject({
			method: "GET",
			url: `/live-sessions/${roomId}`,
			headers: bearer(OUTSIDER),
		});
		expect(denied.statusCode).toBe(403);

		const missing = await app.inject({
			method: "GET",
			url: "/live-sessions/session_000000000000",
			headers: bearer(STUDENT),
		});
		expect(missing.statusCode).toBe(404);
	});

	it("lists chat history oldest first", async () => {
		const { id, roomId } = await createSession();
		await ctx.liveSessions.appendMessage({
			sessionId: id,
			senderId: COUNSELOR.id,
			senderUsername: COUNSELOR.username,
			message: "second",
			messageType: "text",
			timestamp: new Date("2026-03-02T14:40:00.000Z"),
		});
		await ctx.liveSessions.appendMessage({
			sessionId: id,
			senderId: STUDENT.id,
			senderUsername: STUDENT.username,
			message: "first",
			messageType: "text",
			timestamp: new Date("2026-03-02T14:35:00.000Z"),
		});

		const res = await app.inject({
			method: "GET",
			url: `/live-sessions/${roomId}/messages`,
			headers: bearer(STUDENT),
		});

		expect(res.statusCode).toBe(200);
		const body = res.json<{ messages: Array<{ message: string; sender: string }> }>();
		expect(body.messages.map((m) => m.message)).toEqual(["first", "second"]);
		expect(body.messages[0]?.sender).toBe(STUDENT.username);
	});

	it("lets only the counselor edit notes and only the student give consent", async () => {
		const { roomId } = await createSession();

		const notes = await app.inject({
			method: "PATCH",
			url: `/live-sessions/${roomId}/notes`,
			headers: bearer(COUNSELOR),
			payload: { notes: "Discussed sleep routine." },
		});
		expect(notes.statusCode).toBe(200);
		expect(notes.json<PublicSession>().notes).toBe("Discussed sleep routine.");

		const notesByStudent = await app.inject({
			method: "PATCH",
			url: `/live-sessions/${roomId}/notes`,
			headers: bearer(STUDENT),
			payload: { notes: "mine" },
		});
		expect(notesByStudent.statusCode).toBe(403);

		const consent = await app.inject({
			method: "PATCH",
			url: `/live-sessions/${roomId}/consent`,
			headers: bearer(STUDENT),
			payload: { consentGiven: true },
		});
		expect(consent.statusCode).toBe(200);
		expect(consent.json<PublicSession>().consentGiven).toBe(true);

		const consentByCounselor = await app.inject({
			method: "PATCH",
			url: `/live-sessions/${roomId}/consent`,
			headers: bearer(COUNSELOR),
			payload: { consentGiven: false },
		});
		expect(consentByCounselor.statusCode).toBe(403);
	});

	it("ends an active session and answers 409 before it started", async () => {
		const { id, roomId } = await createSession();

		const early = await app.inject({
			method: "POST",
			url: `/live-sessions/${roomId}/end`,
			headers: bearer(COUNSELOR),
		});
		expect(early.statusCode).toBe(409);
		expect(early.json()).toMatchObject({ code: "SESSION_NOT_ACTIVE" });

		ctx.liveSessions.seedStatus(id, "active");
		const ended = await app.inject({
			method: "POST",
			url: `/live-sessions/${roomId}/end`,
			headers: bearer(COUNSELOR),
		});
		expect(ended.statusCode).toBe(200);
		expect(ended.json<PublicSession>().status).toBe("completed");
		expect(ctx.appointments.completed).toEqual([APPOINTMENT.id]);
	});

	it("cancels and marks no-show by appointment id", async () => {
		const { id } = await createSession();

		const cancelled = await app.inject({
			method: "POST",
			url: `/live-sessions/appointments/${APPOINTMENT.id}/cancel`,
			headers: bearer(COUNSELOR),
		});
		expect(cancelled.statusCode).toBe(200);
		expect(cancelled.json<PublicSession>().status).toBe("cancelled");

		const noShow = await app.inject({
			method: "POST",
			url: `/live-sessions/appointments/${APPOINTMENT.id}/no-show`,
			headers: bearer(COUNSELOR),
		});
		expect(noShow.statusCode).toBe(200);
		expect(noShow.json<PublicSession>().status).toBe("cancelled");
		expect(ctx.liveSessions.sessions.get(id)?.status).toBe("cancelled");
	});
});
