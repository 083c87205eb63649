import { beforeEach, describe, expect, it } from "vitest";

import { FakeSocket } from "@/test/fakes/fakeSocket";
import {
	APPOINTMENT,
	COUNSELOR,
	OBSERVER,
	OUTSIDER,
	STUDENT,
	createTestContext,
	silentLogger,
	type TestContext,
} from "@/test/testApp";

import { LIVE_SESSION_TYPES } from "../live-session.types";
import type { LiveSessionCommandService } from "./live-session.command.service";
import type { SessionCoordinator } from "./session-coordinator.service";
import type { SessionGateway } from "./session-gateway.service";
import type { SessionChannel } from "./session-relay.service";

type User = { id: string; username: string };

describe("SessionGateway", () => {
	let ctx: TestContext;
	let gateway: SessionGateway;
	let commands: LiveSessionCommandService;
	let coordinator: SessionCoordinator;
	let roomId: string;

	function connect(user: User | null, channel: SessionChannel = "live", room = roomId) {
		const socket = new FakeSocket();
		const conn = gateway.accept({
			socket,
			roomId: room,
			identity: user ? { userId: user.id, username: user.username } : null,
			channel,
			log: silentLogger,
		});
		return { socket, conn, idle: () => conn?.whenIdle() ?? Promise.resolve() };
	}

	beforeEach(async () => {
		ctx = createTestContext();
		gateway = ctx.container.get<SessionGateway>(LIVE_SESSION_TYPES.SessionGateway);
		commands = ctx.container.get<LiveSessionCommandService>(
			LIVE_SESSION_TYPES.LiveSessionCommandService
		);
		coordinator = ctx.container.get<SessionCoordinator>(
			LIVE_SESSION_TYPES.SessionCoordinator
		);

		const { session } = await commands.createForAppointment(STUDENT.id, {
			appointmentId: APPOINTMENT.id,
		});
		roomId = session.roomId;
	});

	it("runs a session from first join to completion", async () => {
		const again = await commands.createForAppointment(COUNSELOR.id, {
			appointmentId: APPOINTMENT.id,
		});
		expect(again.created).toBe(false);
		expect(again.session.roomId).toBe(roomId);

		const student = connect(STUDENT);
		await student.idle();
		expect((await ctx.liveSessions.findByRoomId(roomId))?.status).toBe("waiting");
		expect(student.socket.eventsOfType("session_state")).toEqual([
			{
				type: "session_state",
				room_id: roomId,
				status: "scheduled",
				session_type: "video",
				role: "student",
			},
		]);

		const counselor = connect(COUNSELOR);
		await counselor.idle();

		const active = await ctx.liveSessions.findByRoomId(roomId);
		expect(active?.status).toBe("active");
		expect(active?.actualStart).toBeInstanceOf(Date);
		expect(student.socket.eventsOfType("session_started")).toHaveLength(1);
		expect(counselor.socket.eventsOfType("session_started")).toHaveLength(1);
		expect(student.socket.eventsOfType("user_joined")).toContainEqual({
			type: "user_joined",
			user_id: COUNSELOR.id,
			username: COUNSELOR.username,
			role: "counselor",
		});

		const ended = await coordinator.endSession(roomId, COUNSELOR.id);
		expect(ended.status).toBe("completed");
		expect(ctx.appointments.completed).toEqual([APPOINTMENT.id]);
		expect(student.socket.eventsOfType("session_ended")).toHaveLength(1);
	});

	it("activates once when both parties connect together", async () => {
		const student = connect(STUDENT);
		const counselor = connect(COUNSELOR, "chat");
		await Promise.all([student.idle(), counselor.idle()]);

		expect((await ctx.liveSessions.findByRoomId(roomId))?.status).toBe("active");
		expect(student.socket.eventsOfType("session_started")).toHaveLength(1);
		expect(counselor.socket.eventsOfType("session_started")).toHaveLength(1);
	});

	it("closes with 4401 when there is no identity", () => {
		const { socket, conn } = connect(null);

		expect(conn).toBeNull();
		expect(socket.closedWith?.code).toBe(4401);
		expect(socket.events()).toEqual([
			{
				type: "error",
				code: "AUTHENTICATION_REQUIRED",
				message: "Authentication required.",
			},
		]);
	});

	it("closes with 4404 for an unknown room", async () => {
		const { socket, idle } = connect(STUDENT, "live", "session_ffffffffffff");
		await idle();

		expect(socket.closedWith?.code).toBe(4404);
		expect(socket.eventsOfType("error")).toEqual([
			{ type: "error", code: "NOT_FOUND", message: "Session not found" },
		]);
	});

	it.each([
		["an outsider", OUTSIDER],
		["an observer", OBSERVER],
	])("closes with 4403 for %s and persists nothing", async (_label, user) => {
		const { socket, idle } = connect(user);
		await idle();

		expect(socket.closedWith?.code).toBe(4403);
		expect(socket.eventsOfType("error")).toEqual([
			{ type: "error", code: "ACCESS_DENIED", message: "Access denied" },
		]);
		expect(ctx.liveSessions.participants).toEqual([]);
		expect(ctx.hub.size(`live_session_${roomId}`)).toBe(0);
		expect((await ctx.liveSessions.findByRoomId(roomId))?.status).toBe("scheduled");
	});

	it("handles frames sent before admission finished", async () => {
		const { socket, idle } = connect(STUDENT);
		socket.receive({ type: "ping" });
		await idle();

		const types = socket.events().map((e) => e.type);
		expect(types.indexOf("session_state")).toBeLessThan(types.indexOf("pong"));
	});

	it("cleans up on disconnect and tells the room", async () => {
		const student = connect(STUDENT);
		const counselor = connect(COUNSELOR);
		await Promise.all([student.idle(), counselor.idle()]);

		student.socket.disconnect();
		await student.idle();

		const row = ctx.liveSessions.participants.find((p) => p.userId === STUDENT.id);
		expect(row?.leftAt).toBeInstanceOf(Date);
		expect(ctx.hub.size(`live_session_${roomId}`)).toBe(1);
		expect(counselor.socket.eventsOfType("user_left")).toEqual([
			{ type: "user_left", user_id: STUDENT.id, username: STUDENT.username },
		]);
		expect((await ctx.liveSessions.findByRoomId(roomId))?.status).toBe("active");
	});

	it("keeps a user present while another of their sockets is open", async () => {
		const studentLive = connect(STUDENT);
		await studentLive.idle();
		const studentChat = connect(STUDENT, "chat");
		await studentChat.idle();

		studentChat.socket.disconnect();
		await studentChat.idle();

		const row = ctx.liveSessions.participants.find((p) => p.userId === STUDENT.id);
		expect(row?.leftAt).toBeNull();

		const counselor = connect(COUNSELOR);
		await counselor.idle();

		expect((await ctx.liveSessions.findByRoomId(roomId))?.status).toBe("active");
		expect(studentLive.socket.eventsOfType("session_started")).toHaveLength(1);
		expect(counselor.socket.eventsOfType("user_left")).toEqual([]);
	});

	it("announces a user once across tabs and leaves on the last close", async () => {
		const counselor = connect(COUNSELOR);
		await counselor.idle();
		const tab1 = connect(STUDENT);
		const tab2 = connect(STUDENT);
		await Promise.all([tab1.idle(), tab2.idle()]);

		const studentJoins = counselor.socket
			.eventsOfType("user_joined")
			.filter((e) => e.user_id === STUDENT.id);
		expect(studentJoins).toHaveLength(1);

		tab1.socket.disconnect();
		await tab1.idle();
		expect(counselor.socket.eventsOfType("user_left")).toEqual([]);
		expect(
			ctx.liveSessions.participants.find((p) => p.userId === STUDENT.id)?.leftAt
		).toBeNull();

		tab2.socket.disconnect();
		await tab2.idle();
		expect(counselor.socket.eventsOfType("user_left")).toEqual([
			{ type: "user_left", user_id: STUDENT.id, username: STUDENT.username },
		]);
		expect(
			ctx.liveSessions.participants.find((p) => p.userId === STUDENT.id)?.leftAt
		).toBeInstanceOf(Date);
	});

	it("records left_at on a terminal session too", async () => {
		const student = connect(STUDENT);
		await student.idle();
		await coordinator.cancelForAppointment(APPOINTMENT.id, STUDENT.id);

		student.socket.disconnect();
		await student.idle();

		const row = ctx.liveSessions.participants.find((p) => p.userId === STUDENT.id);
		expect(row?.leftAt).toBeInstanceOf(Date);
	});

	it("reconnecting reuses the participant row", async () => {
		const first = connect(STUDENT);
		await first.idle();
		first.socket.disconnect();
		await first.idle();

		const second = connect(STUDENT);
		await second.idle();

		const rows = ctx.liveSessions.participants.filter((p) => p.userId === STUDENT.id);
		expect(rows).toHaveLength(1);
		expect(rows[0]?.leftAt).toBeNull();
	});
});
