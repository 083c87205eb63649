import { sql } from "drizzle-orm";
import {
	boolean,
	index,
	jsonb,
	pgEnum,
	pgTable,
	text,
	timestamp,
	uniqueIndex,
	uuid,
	varchar,
} from "drizzle-orm/pg-core";

export const liveSessionTypeEnum = pgEnum("live_session_type", [
	"video",
	"audio",
	"chat",
]);

export const liveSessionStatusEnum = pgEnum("live_session_status", [
	"scheduled",
	"waiting",
	"active",
	"completed",
	"cancelled",
	"no_show",
]);

export const privacyLevelEnum = pgEnum("live_session_privacy_level", [
	"private",
	"supervised",
	"training",
]);

export const participantRoleEnum = pgEnum("session_participant_role", [
	"student",
	"counselor",
	"observer",
]);

export const connectionQualityEnum = pgEnum("connection_quality", [
	"excellent",
	"good",
	"fair",
	"poor",
]);

export const sessionMessageTypeEnum = pgEnum("session_message_type", [
	"text",
	"system",
]);

export const notificationPriorityEnum = pgEnum("notification_priority", [
	"low",
	"normal",
	"high",
	"urgent",
]);

const tz = { withTimezone: true, mode: "date" } as const;

export const liveSessions = pgTable(
	"live_sessions",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		appointmentId: varchar("appointment_id", { length: 64 }).notNull(),
		studentId: varchar("student_id", { length: 64 }).notNull(),
		counselorId: varchar("counselor_id", { length: 64 }).notNull(),
		observerIds: text("observer_ids")
			.array()
			.notNull()
			.default(sql`'{}'::text[]`),

		sessionType: liveSessionTypeEnum("session_type").notNull().default("video"),
		status: liveSessionStatusEnum("status").notNull().default("scheduled"),
		roomId: varchar("room_id", { length: 100 }).notNull(),

		scheduledStart: timestamp("scheduled_start", tz).notNull(),
		scheduledEnd: timestamp("scheduled_end", tz).notNull(),
		actualStart: timestamp("actual_start", tz),
		actualEnd: timestamp("actual_end", tz),

		notes: text("notes").notNull().default(""),
		isRecorded: boolean("is_recorded").notNull().default(false),
		consentGiven: boolean("consent_given").notNull().default(false),
		privacyLevel: privacyLevelEnum("privacy_level").notNull().default("private"),

		createdAt: timestamp("created_at", tz).notNull().defaultNow(),
		updatedAt: timestamp("updated_at", tz).notNull().defaultNow(),
	},
	(t) => [
		uniqueIndex("live_sessions_appointment_id_key").on(t.appointmentId),
		uniqueIndex("live_sessions_room_id_key").on(t.roomId),
		index("live_sessions_status_idx").on(t.status),
	]
);

export const sessionParticipants = pgTable(
	"session_participants",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		sessionId: uuid("session_id")
			.notNull()
			.references(() => liveSessions.id, { onDelete: "cascade" }),
		userId: varchar("user_id", { length: 64 }).notNull(),
		username: varchar("username", { length: 150 }).notNull(),
		role: participantRoleEnum("role").notNull(),
		joinedAt: timestamp("joined_at", tz).notNull().defaultNow(),
		leftAt: timestamp("left_at", tz),
		connectionQuality: connectionQualityEnum("connection_quality"),
	},
	(t) => [
		uniqueIndex("session_participants_session_user_key").on(t.sessionId, t.userId),
	]
);

export const sessionMessages = pgTable(
	"session_messages",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		sessionId: uuid("session_id")
			.notNull()
			.references(() => liveSessions.id, { onDelete: "cascade" }),
		senderId: varchar("sender_id", { length: 64 }).notNull(),
		senderUsername: varchar("sender_username", { length: 150 }).notNull(),
		message: text("message").notNull(),
		messageType: sessionMessageTypeEnum("message_type").notNull().default("text"),
		timestamp: timestamp("timestamp", tz).notNull().defaultNow(),
	},
	(t) => [index("session_messages_session_ts_idx").on(t.sessionId, t.timestamp)]
);

export const notifications = pgTable(
	"notifications",
	{
		id: uuid("id").primaryKey().defaultRandom(),
		userId: varchar("user_id", { length: 64 }).notNull(),
		message: text("message").notNull(),
		type: varchar("type", { length: 20 }).notNull().default("general"),
		priority: notificationPriorityEnum("priority").notNull().default("normal"),
		actionUrl: text("action_url"),
		actionText: varchar("action_text", { length: 50 }),
		metadata: jsonb("metadata")
			.$type<Record<string, unknown>>()
			.notNull()
			.default({}),
		createdAt: timestamp("created_at", tz).notNull().defaultNow(),
		expiresAt: timestamp("expires_at", tz),
		read: boolean("read").notNull().default(false),
		dismissed: boolean("dismissed").notNull().default(false),
	},
	(t) => [
		index("notifications_user_read_dismissed_idx").on(t.userId, t.read, t.dismissed),
		index("notifications_user_created_idx").on(t.userId, t.createdAt),
		index("notifications_expires_idx").on(t.expiresAt),
	]
);

export type LiveSessionRow = typeof liveSessions.$inferSelect;
export type SessionParticipantRow = typeof sessionParticipants.$inferSelect;
export type SessionMessageRow = typeof sessionMessages.$inferSelect;
export type NotificationRow = typeof notifications.$inferSelect;
