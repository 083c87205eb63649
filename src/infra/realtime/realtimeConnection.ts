import { randomUUID } from "node:crypto";

import type { LoggerLike } from "@/infra/observability";
import { childLogger, errorMessage } from "@/infra/observability";
import type { RealtimeMember } from "./realtimeHub";
import { WS_CLOSE_CODES } from "./realtime.errors";

/**
 * Minimal WS connection shape we rely on.
 */
export type RealtimeSocket = {
	readonly readyState: number;
	send(data: string): void;
	close(code?: number, reason?: string): void;
	on(event: "message", listener: (data: unknown) => void): void;
	on(event: "close" | "error", listener: (...args: unknown[]) => void): void;
};

export type ConnectionIdentity = {
	userId: string;
	username: string;
};

export type ConnectionHandlers = {
	/** First task on the inbox; frames queue up behind it. */
	open: (conn: RealtimeConnection) => Promise<void>;
	frame: (conn: RealtimeConnection, raw: string) => Promise<void>;
	/** Last task on the inbox; runs once, after `open` settled. */
	close: (conn: RealtimeConnection) => Promise<void>;
};

type InboxItem =
	| { kind: "open" }
	| { kind: "frame"; raw: string }
	| { kind: "close" };

const WS_READY_STATE_OPEN = 1;

export function decodeFrame(data: unknown): string {
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	if (Array.isArray(data)) {
		const chunks = data.filter((x): x is Buffer => Buffer.isBuffer(x));
		return Buffer.concat(chunks).toString("utf8");
	}
	if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
	return String(data);
}

/**
 * One live socket: identity, joined topics and a sequential inbox.
 * Handlers for a single connection never run concurrently.
 */
export class RealtimeConnection implements RealtimeMember {
	readonly id: string;
	readonly topics = new Set<string>();
	readonly log: LoggerLike;

	private readonly inbox: InboxItem[] = [];
	private loop: Promise<void> | null = null;
	private closeQueued = false;
	private cleanedUp = false;

	constructor(
		private readonly socket: RealtimeSocket,
		readonly identity: ConnectionIdentity,
		private readonly handlers: ConnectionHandlers,
		log: LoggerLike,
		readonly tag = "ws"
	) {
		this.id = randomUUID();
		this.log = childLogger(log, {
			connId: this.id,
			userId: identity.userId,
			tag,
		});
	}

	start(): void {
		this.socket.on("message", (data: unknown) => {
			this.enqueue({ kind: "frame", raw: decodeFrame(data) });
		});

		this.socket.on("close", () => {
			this.queueClose();
		});

		this.socket.on("error", (err: unknown) => {
			this.log.warn({ err: errorMessage(err) }, "socket error");
		});

		this.enqueue({ kind: "open" });
	}

	isOpen(): boolean {
		return this.socket.readyState === WS_READY_STATE_OPEN;
	}

	/** Raw send used by the hub; failures propagate to the caller. */
	send(data: string): void {
		this.socket.send(data);
	}

	/** Direct reply to this connection only. Never throws. */
	sendEvent(event: unknown): void {
		if (!this.isOpen()) return;
		try {
			this.socket.send(JSON.stringify(event));
		} catch {
			// ignore
		}
	}

	close(code: number = WS_CLOSE_CODES.INTERNAL, reason?: string): void {
		try {
			this.socket.close(code, reason);
		} catch (err) {
			this.log.warn({ err: errorMessage(err) }, "socket close failed");
		}
	}

	get isCleanedUp(): boolean {
		return this.cleanedUp;
	}

	/** Resolves once every queued task has been handled. */
	whenIdle(): Promise<void> {
		return this.loop ?? Promise.resolve();
	}

	private queueClose(): void {
		if (this.closeQueued) return;
		this.closeQueued = true;
		this.enqueue({ kind: "close" });
	}

	private enqueue(item: InboxItem): void {
		this.inbox.push(item);
		if (!this.loop) {
			this.loop = this.drain();
		}
	}

	private async drain(): Promise<void> {
		try {
			for (let item = this.inbox.shift(); item; item = this.inbox.shift()) {
				await this.process(item);
			}
		} finally {
			this.loop = null;
		}
	}

	private async process(item: InboxItem): Promise<void> {
		if (item.kind === "close") {
			if (this.cleanedUp) return;
			this.cleanedUp = true;

			try {
				await this.handlers.close(this);
			} catch (err) {
				// not retried: participant state is reconciled from the store
				this.log.error({ err: errorMessage(err) }, "disconnect cleanup failed");
			}
			return;
		}

		if (this.cleanedUp) return;

		try {
			if (item.kind === "open") {
				await this.handlers.open(this);
			} else {
				await this.handlers.frame(this, item.raw);
			}
		} catch (err) {
			this.log.error(
				{ err: errorMessage(err), stage: item.kind },
				"handler failed; closing connection"
			);
			this.sendEvent({
				type: "error",
				code: "INTERNAL",
				message: "Internal error.",
			});
			this.close(WS_CLOSE_CODES.INTERNAL, "internal error");
		}
	}
}
