import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { Container } from "inversify";
import { ZodError } from "zod";

import { websocketPlugin } from "./plugins/websocket";
import { loadEnv, type Env } from "./config/env";
import { createContainer } from "./container";
import { UserFacingError } from "./infra/userFacingError";
import { createAuthGuard } from "./modules/auth/auth.guard";
import { registerLiveSessionRoutes } from "./modules/live-session/live-session.controller";
import { registerNotificationsRoutes } from "./modules/notifications/notifications.controller";

export type BuildServerOptions = {
	env?: Env;
	container?: Container;
};

export async function buildServer(opts: BuildServerOptions = {}) {
	const env = opts.env ?? loadEnv();

	const app = Fastify({
		logger: env.NODE_ENV !== "test",
	});

	const container = opts.container ?? createContainer(env, app.log);

	await app.register(websocketPlugin, { maxPayload: env.WS_MAX_PAYLOAD_BYTES });
	await app.register(cors, {
		origin: env.NODE_ENV === "production" ? [env.FRONTEND_URL] : true,
		methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
		allowedHeaders: ["Authorization", "Content-Type"],
		credentials: true,
		maxAge: 86400,
	});

	// Swagger should not be exposed in production
	if (env.NODE_ENV !== "production") {
		await app.register(swagger, {
			openapi: {
				info: { title: "Session Relay API", version: "1.0.0" },
				components: {
					securitySchemes: {
						bearerAuth: {
							type: "http",
							scheme: "bearer",
							bearerFormat: "JWT",
						},
					},
				},
			},
		});
		await app.register(swaggerUi, {
			routePrefix: "/docs",
		});
	}

	app.setErrorHandler((err: FastifyError, req, reply) => {
		if (err instanceof UserFacingError) {
			return reply.code(err.statusCode).send(err.toBody());
		}

		if (err instanceof ZodError) {
			return reply.code(400).send({
				code: "VALIDATION_ERROR",
				message: "Invalid request.",
				issues: err.issues,
			});
		}

		// fastify's own 4xx (bad JSON body, payload too large, ...)
		if (typeof err.statusCode === "number" && err.statusCode < 500) {
			return reply.code(err.statusCode).send({
				code: err.code ?? "BAD_REQUEST",
				message: err.message,
			});
		}

		req.log.error({ err }, "unhandled error");
		return reply.code(500).send({
			code: "INTERNAL",
			message: "Internal server error.",
		});
	});

	app.get("/health", async () => ({ status: "ok" }));

	// Protect everything else
	app.addHook("onRequest", createAuthGuard(env));

	registerLiveSessionRoutes(app, container);
	registerNotificationsRoutes(app, container);

	return { app, env, container };
}
