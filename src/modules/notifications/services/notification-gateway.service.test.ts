import { randomUUID } from "node:crypto";

import { beforeEach, describe, expect, it } from "vitest";

import { FakeSocket } from "@/test/fakes/fakeSocket";
import { STUDENT, createTestContext, silentLogger, type TestContext } from "@/test/testApp";

import { NOTIFICATION_TYPES } from "../notifications.types";
import type { NotificationDispatcher } from "./notification.dispatcher.service";
import type { NotificationGateway } from "./notification-gateway.service";

describe("NotificationGateway", () => {
	let ctx: TestContext;
	let gateway: NotificationGateway;
	let dispatcher: NotificationDispatcher;

	beforeEach(() => {
		ctx = createTestContext();
		gateway = ctx.container.get<NotificationGateway>(NOTIFICATION_TYPES.NotificationGateway);
		dispatcher = ctx.container.get<NotificationDispatcher>(
			NOTIFICATION_TYPES.NotificationDispatcher
		);
	});

	function connect() {
		const socket = new FakeSocket();
		const conn = gateway.accept({
			socket,
			identity: { userId: STUDENT.id, username: STUDENT.username },
			log: silentLogger,
		});
		if (!conn) throw new Error("connection rejected");
		return { socket, conn };
	}

	it("rejects anonymous sockets with 4401", () => {
		const socket = new FakeSocket();

		const conn = gateway.accept({ socket, identity: null, log: silentLogger });

		expect(conn).toBeNull();
		expect(socket.events()).toEqual([
			{
				type: "error",
				code: "AUTHENTICATION_REQUIRED",
				message: "Authentication required.",
			},
		]);
		expect(socket.closedWith?.code).toBe(4401);
	});

	it("sends the unread count on connect and pushes new notifications", async () => {
		await dispatcher.create({ userId: STUDENT.id, message: "earlier" });
		const { socket, conn } = connect();
		await conn.whenIdle();

		expect(socket.events()).toEqual([{ type: "notification_count", count: 1 }]);

		const n = await dispatcher.create({ userId: STUDENT.id, message: "fresh" });

		expect(socket.events().slice(1)).toEqual([
			{
				type: "new_notification",
				notification: expect.objectContaining({ id: n.id, message: "fresh" }),
			},
			{ type: "notification_count", count: 2 },
		]);
	});

	it("serves get_notifications and mark_read", async () => {
		const first = await dispatcher.create({ userId: STUDENT.id, message: "one" });
		await dispatcher.create({ userId: STUDENT.id, message: "two" });
		const { socket, conn } = connect();
		await conn.whenIdle();

		socket.receive({ type: "mark_read", notification_id: first.id });
		socket.receive({ type: "get_notifications", limit: 5 });
		await conn.whenIdle();

		expect(socket.eventsOfType("notification_count").map((e) => e.count)).toEqual([2, 1]);
		const [list] = socket.eventsOfType("notifications_list");
		expect(list?.unread_count).toBe(1);
		expect(list?.notifications).toEqual([
			expect.objectContaining({ message: "two", read: false }),
			expect.objectContaining({ message: "one", read: true }),
		]);
	});

	it("answers bad frames with an error and keeps the socket open", async () => {
		const { socket, conn } = connect();
		await conn.whenIdle();

		socket.receive("not json");
		socket.receive({ type: "subscribe" });
		socket.receive({ type: "dismiss", notification_id: "nope" });
		socket.receive({ type: "mark_read", notification_id: randomUUID() });
		socket.receive({ type: "ping" });
		await conn.whenIdle();

		const errors = socket.eventsOfType("error").map((e) => e.code);
		expect(errors).toEqual(["INVALID_JSON", "UNKNOWN_TYPE", "VALIDATION", "NOT_FOUND"]);
		expect(socket.eventsOfType("pong")).toHaveLength(1);
		expect(socket.closedWith).toBeNull();
	});

	it("stops pushing after the socket closes", async () => {
		const { socket, conn } = connect();
		await conn.whenIdle();

		socket.disconnect();
		await conn.whenIdle();
		await dispatcher.create({ userId: STUDENT.id, message: "after close" });

		expect(conn.isCleanedUp).toBe(true);
		expect(socket.events()).toEqual([{ type: "notification_count", count: 0 }]);
	});
});
