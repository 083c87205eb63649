import type { FastifyRequest } from "fastify";

import { findRequestUser } from "@/infra/auth/requestUser";
import type { LoggerLike } from "@/infra/observability";
import { errorMessage } from "@/infra/observability";
import type { ConnectionIdentity, RealtimeSocket } from "./realtimeConnection";
import { closeCodeFor, type RealtimeError } from "./realtime.errors";

type UnknownRecord = Record<string, unknown>;

function isRecord(v: unknown): v is UnknownRecord {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isRealtimeSocket(v: unknown): v is RealtimeSocket {
	return (
		isRecord(v) &&
		typeof v.send === "function" &&
		typeof v.on === "function" &&
		typeof v.close === "function" &&
		typeof v.readyState === "number"
	);
}

/**
 * @fastify/websocket hands over the socket itself; older versions wrapped it in
 * a `{ socket }` stream. Accept both.
 */
export function extractWsSocket(conn: unknown): RealtimeSocket {
	const candidate = isRecord(conn) && "socket" in conn ? conn.socket : conn;

	if (!isRealtimeSocket(candidate)) {
		const keys = isRecord(candidate) ? Object.keys(candidate) : [];
		throw new Error(`WS socket has invalid shape (keys=${keys.join(",")})`);
	}

	return candidate;
}

export function wsIdentity(req: FastifyRequest): ConnectionIdentity | null {
	const user = findRequestUser(req);
	return user ? { userId: user.id, username: user.username } : null;
}

/** Error frame, then close with the code matching the failure. */
export function rejectSocket(
	socket: RealtimeSocket,
	err: RealtimeError,
	log: LoggerLike
): void {
	log.info({ code: err.code, message: err.message }, "ws connection rejected");
	try {
		socket.send(
			JSON.stringify({ type: "error", code: err.code, message: err.message })
		);
		socket.close(closeCodeFor(err), err.code);
	} catch (sendErr) {
		log.warn({ err: errorMessage(sendErr) }, "failed to reject ws connection");
	}
}
