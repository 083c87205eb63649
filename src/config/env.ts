import { z } from "zod";

const optionalTrimmedString = z
	.string()
	.optional()
	.transform((v) => {
		if (typeof v !== "string") return undefined;
		const trimmed = v.trim();
		return trimmed ? trimmed : undefined;
	});

const EnvSchema = z.object({
	NODE_ENV: z
		.enum(["development", "production", "test"])
		.default("development"),
	PORT: z.coerce.number().default(3001),
	DATABASE_URL: z.url(),
	FRONTEND_URL: z.url().default("http://localhost:3000"),

	AUTH_JWT_SECRET: z
		.string()
		.min(16)
		.default("dev-insecure-secret-change-me-please-123456"),

	REDIS_URL: optionalTrimmedString,

	APPOINTMENTS_API_URL: z.preprocess(
		(v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
		z.url().optional()
	),
	APPOINTMENTS_API_TOKEN: optionalTrimmedString,

	SESSION_DEFAULT_DURATION_MINUTES: z.coerce.number().int().positive().default(60),
	NOTIFICATION_SWEEP_EVERY_MS: z.coerce
		.number()
		.int()
		.positive()
		.default(60 * 60 * 1000),
	WS_MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
});

export type Env = z.infer<typeof EnvSchema>;

export const loadEnv = (): Env => {
	const parsed = EnvSchema.safeParse(process.env);
	if (!parsed.success) {
		console.error(z.treeifyError(parsed.error));
		throw new Error("Invalid environment variables");
	}

	if (
		parsed.data.NODE_ENV === "production" &&
		typeof process.env.AUTH_JWT_SECRET !== "string"
	) {
		throw new Error("AUTH_JWT_SECRET must be set in production");
	}

	if (parsed.data.APPOINTMENTS_API_URL && !parsed.data.APPOINTMENTS_API_TOKEN) {
		throw new Error("APPOINTMENTS_API_TOKEN must be set with APPOINTMENTS_API_URL");
	}

	return parsed.data;
};
