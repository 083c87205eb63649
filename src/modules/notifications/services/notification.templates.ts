import { inject, injectable } from "inversify";

import type { Notification } from "../notifications.dto";
import { NOTIFICATION_TYPES } from "../notifications.types";
import { NotificationDispatcher } from "./notification.dispatcher.service";

export type AppointmentNotice = {
	appointmentId: string;
	studentId: string;
	studentName: string;
	counselorName: string;
	/** Counselors without an account get no notification. */
	counselorUserId?: string | null;
	startsAt: Date;
	cancellationReason?: string;
};

export type ReportNotice = {
	reportId: string;
	studentId: string;
	counselorName: string;
	reportType: string;
	title: string;
};

function two(n: number): string {
	return String(n).padStart(2, "0");
}

// UTC; clients localize from the metadata
export function formatDay(d: Date): string {
	return `${d.getUTCFullYear()}-${two(d.getUTCMonth() + 1)}-${two(d.getUTCDate())}`;
}

export function formatClock12(d: Date): string {
	const h = d.getUTCHours();
	const suffix = h < 12 ? "AM" : "PM";
	return `${two(h % 12 === 0 ? 12 : h % 12)}:${two(d.getUTCMinutes())} ${suffix}`;
}

function formatClock24(d: Date): string {
	return `${two(d.getUTCHours())}:${two(d.getUTCMinutes())}`;
}

@injectable()
export class NotificationTemplates {
	constructor(
		@inject(NOTIFICATION_TYPES.NotificationDispatcher)
		private readonly dispatcher: NotificationDispatcher
	) {}

	async appointmentCreated(a: AppointmentNotice): Promise<Notification[]> {
		const day = formatDay(a.startsAt);
		const clock = formatClock12(a.startsAt);

		const sent = [
			await this.dispatcher.create({
				userId: a.studentId,
				message: `Your appointment with ${a.counselorName} on ${day} at ${clock} has been booked successfully.`,
				type: "appointment",
				priority: "normal",
				actionUrl: `/appointment/${a.appointmentId}/`,
				actionText: "View Details",
				expiresInHours: 72,
				metadata: {
					appointment_id: a.appointmentId,
					counselor_name: a.counselorName,
					appointment_date: day,
					appointment_time: formatClock24(a.startsAt),
				},
			}),
		];

		if (a.counselorUserId) {
			sent.push(
				await this.dispatcher.create({
					userId: a.counselorUserId,
					message: `New appointment request from ${a.studentName} on ${day} at ${clock}.`,
					type: "appointment",
					priority: "high",
					actionUrl: `/counselor/appointment/${a.appointmentId}/`,
					actionText: "Review",
					expiresInHours: 48,
					metadata: {
						appointment_id: a.appointmentId,
						student_name: a.studentName,
						appointment_date: day,
						appointment_time: formatClock24(a.startsAt),
					},
				})
			);
		}

		return sent;
	}

	appointmentReminder(a: AppointmentNotice): Promise<Notification> {
		return this.dispatcher.create({
			userId: a.studentId,
			message: `Reminder: You have an appointment with ${a.counselorName} tomorrow at ${formatClock12(a.startsAt)}.`,
			type: "reminder",
			priority: "high",
			actionUrl: `/appointment/${a.appointmentId}/`,
			actionText: "View Details",
			expiresInHours: 24,
			metadata: {
				appointment_id: a.appointmentId,
				counselor_name: a.counselorName,
				appointment_date: formatDay(a.startsAt),
				appointment_time: formatClock24(a.startsAt),
			},
		});
	}

	appointmentCancelled(a: AppointmentNotice): Promise<Notification> {
		return this.dispatcher.create({
			userId: a.studentId,
			message: `Your appointment with ${a.counselorName} on ${formatDay(a.startsAt)} has been cancelled.`,
			type: "appointment",
			priority: "high",
			actionUrl: "/scheduler/",
			actionText: "Book New",
			expiresInHours: 168,
			metadata: {
				appointment_id: a.appointmentId,
				counselor_name: a.counselorName,
				appointment_date: formatDay(a.startsAt),
				cancellation_reason: a.cancellationReason ?? "",
			},
		});
	}

	reportCompleted(r: ReportNotice): Promise<Notification> {
		return this.dispatcher.create({
			userId: r.studentId,
			message: `Your session report with ${r.counselorName} has been completed.`,
			type: "report",
			priority: "normal",
			actionUrl: "/user-profile/",
			actionText: "View Report",
			expiresInHours: 168,
			metadata: {
				report_id: r.reportId,
				counselor_name: r.counselorName,
				report_type: r.reportType,
				report_title: r.title,
			},
		});
	}

	feedbackRequest(a: AppointmentNotice): Promise<Notification> {
		return this.dispatcher.create({
			userId: a.studentId,
			message: `Please share your feedback about your session with ${a.counselorName}.`,
			type: "feedback",
			priority: "normal",
			actionUrl: `/feedback/${a.appointmentId}/`,
			actionText: "Give Feedback",
			expiresInHours: 168,
			metadata: {
				appointment_id: a.appointmentId,
				counselor_name: a.counselorName,
				appointment_date: formatDay(a.startsAt),
			},
		});
	}
}
