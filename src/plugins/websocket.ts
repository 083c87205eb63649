import fp from "fastify-plugin";
import websocket from "@fastify/websocket";

export type WebsocketPluginOptions = {
	maxPayload: number;
};

/**
 * Registers WebSocket support for Fastify.
 * Must be registered BEFORE WS routes.
 */
export const websocketPlugin = fp<WebsocketPluginOptions>(async (app, opts) => {
	await app.register(websocket, {
		options: {
			maxPayload: opts.maxPayload,
		},
	});
});
