import "fastify";

import type { RequestUser } from "@/modules/auth/auth.guard";

declare module "fastify" {
	interface FastifyRequest {
		user?: RequestUser;
	}
}
