/**
 * Topic names shared by the gateway, coordinator and dispatcher.
 */
export const topics = {
	liveSession: (roomId: string) => `live_session_${roomId}`,
	chat: (roomId: string) => `chat_${roomId}`,
	notifications: (userId: string) => `notifications_${userId}`,
	/** Every topic that carries session-level events for one room. */
	sessionRoom: (roomId: string) => [
		`live_session_${roomId}`,
		`chat_${roomId}`,
	],
} as const;
