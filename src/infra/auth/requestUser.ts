import type { FastifyRequest } from "fastify";

import { UserFacingError } from "@/infra/userFacingError";

export type RequestUserInfo = {
	id: string;
	username: string;
	role?: string;
};

export function findRequestUser(req: FastifyRequest): RequestUserInfo | null {
	const user = req.user;

	if (
		user &&
		typeof user.id === "string" &&
		user.id.length > 0 &&
		typeof user.username === "string" &&
		user.username.length > 0
	) {
		return {
			id: user.id,
			username: user.username,
			role: user.role,
		};
	}

	return null;
}

export function requireRequestUser(req: FastifyRequest): RequestUserInfo {
	const user = findRequestUser(req);
	if (user) return user;

	throw new UserFacingError({
		code: "UNAUTHORIZED",
		statusCode: 401,
		userMessage: "Unauthorized.",
	});
}

export function requireRequestUserId(req: FastifyRequest): string {
	return requireRequestUser(req).id;
}
