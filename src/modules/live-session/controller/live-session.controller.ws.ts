import type { FastifyInstance, FastifyRequest } from "fastify";

import { errorMessage } from "@/infra/observability";
import type { RealtimeSocket } from "@/infra/realtime/realtimeConnection";
import { extractWsSocket, wsIdentity } from "@/infra/realtime/wsSocket";

import type { SessionChannel } from "../services/session-relay.service";
import { RoomParamsSchema } from "../schemas/live-session.schemas";
import type { LiveSessionControllerDeps } from "./live-session.controller.types";

const ROUTES: Record<SessionChannel, string> = {
	live: "/ws/live-session/:roomId",
	chat: "/ws/chat/:roomId",
};

export function registerLiveSessionWsRoutes(
	app: FastifyInstance,
	deps: LiveSessionControllerDeps
): void {
	for (const channel of ["live", "chat"] as const) {
		app.get(ROUTES[channel], { websocket: true }, (conn, req) => {
			acceptRoomSocket(conn, req, channel, deps);
		});
	}
}

function acceptRoomSocket(
	conn: unknown,
	req: FastifyRequest,
	channel: SessionChannel,
	deps: LiveSessionControllerDeps
): void {
	let socket: RealtimeSocket;
	try {
		socket = extractWsSocket(conn);
	} catch (e) {
		req.log.warn({ err: errorMessage(e) }, "failed to extract ws socket");
		return;
	}

	const params = RoomParamsSchema.safeParse(req.params);
	const roomId = params.success ? params.data.roomId : "";

	deps.gateway.accept({
		socket,
		roomId,
		identity: wsIdentity(req),
		channel,
		log: req.log,
	});
}
