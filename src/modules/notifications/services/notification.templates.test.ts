import { beforeEach, describe, expect, it } from "vitest";

import { COUNSELOR, STUDENT, createTestContext, type TestContext } from "@/test/testApp";

import { NOTIFICATION_TYPES } from "../notifications.types";
import {
	formatClock12,
	formatDay,
	type AppointmentNotice,
	type NotificationTemplates,
} from "./notification.templates";

const notice: AppointmentNotice = {
	appointmentId: "appt-42",
	studentId: STUDENT.id,
	studentName: "Sam Student",
	counselorName: "Dr. Carter",
	startsAt: new Date("2026-03-02T14:30:00.000Z"),
};

describe("time formatting", () => {
	it("formats in UTC on a 12 hour clock", () => {
		expect(formatDay(new Date("2026-03-02T14:30:00.000Z"))).toBe("2026-03-02");
		expect(formatClock12(new Date("2026-03-02T14:30:00.000Z"))).toBe("02:30 PM");
		expect(formatClock12(new Date("2026-03-02T00:05:00.000Z"))).toBe("12:05 AM");
		expect(formatClock12(new Date("2026-03-02T12:00:00.000Z"))).toBe("12:00 PM");
	});
});

describe("NotificationTemplates", () => {
	let ctx: TestContext;
	let templates: NotificationTemplates;

	beforeEach(() => {
		ctx = createTestContext();
		templates = ctx.container.get<NotificationTemplates>(
			NOTIFICATION_TYPES.NotificationTemplates
		);
	});

	it("notifies only the student when the counselor has no account", async () => {
		const sent = await templates.appointmentCreated(notice);

		expect(sent).toHaveLength(1);
		expect(sent[0]).toMatchObject({
			userId: STUDENT.id,
			type: "appointment",
			priority: "normal",
			message:
				"Your appointment with Dr. Carter on 2026-03-02 at 02:30 PM has been booked successfully.",
			actionUrl: "/appointment/appt-42/",
			metadata: {
				appointment_id: "appt-42",
				counselor_name: "Dr. Carter",
				appointment_date: "2026-03-02",
				appointment_time: "14:30",
			},
		});
	});

	it("also notifies the counselor when they have an account", async () => {
		const sent = await templates.appointmentCreated({
			...notice,
			counselorUserId: COUNSELOR.id,
		});

		expect(sent.map((n) => n.userId)).toEqual([STUDENT.id, COUNSELOR.id]);
		expect(sent[1]).toMatchObject({
			priority: "high",
			message: "New appointment request from Sam Student on 2026-03-02 at 02:30 PM.",
			actionUrl: "/counselor/appointment/appt-42/",
		});
	});

	it("builds reminder, cancellation and feedback notices", async () => {
		const reminder = await templates.appointmentReminder(notice);
		const cancelled = await templates.appointmentCancelled({
			...notice,
			cancellationReason: "Counselor unavailable",
		});
		const feedback = await templates.feedbackRequest(notice);

		expect(reminder.message).toBe(
			"Reminder: You have an appointment with Dr. Carter tomorrow at 02:30 PM."
		);
		expect(reminder.type).toBe("reminder");
		expect(cancelled.message).toBe(
			"Your appointment with Dr. Carter on 2026-03-02 has been cancelled."
		);
		expect(cancelled.metadata.cancellation_reason).toBe("Counselor unavailable");
		expect(feedback.actionUrl).toBe("/feedback/appt-42/");
		expect(await ctx.notifications.countUnread(STUDENT.id)).toBe(3);
	});

	it("announces completed reports", async () => {
		const n = await templates.reportCompleted({
			reportId: "rep-7",
			studentId: STUDENT.id,
			counselorName: "Dr. Carter",
			reportType: "progress",
			title: "Term check-in",
		});

		expect(n.message).toBe("Your session report with Dr. Carter has been completed.");
		expect(n.metadata).toEqual({
			report_id: "rep-7",
			counselor_name: "Dr. Carter",
			report_type: "progress",
			report_title: "Term check-in",
		});
	});
});
