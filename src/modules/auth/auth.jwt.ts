import crypto from "node:crypto";
import { z } from "zod";

const JWT_HEADER = { alg: "HS256", typ: "JWT" } as const;
const DEFAULT_TTL_SECONDS = 60 * 60;

const JwtPayloadSchema = z.object({
  sub: z.string().min(1),
  username: z.string().min(1),
  role: z.string().min(1).optional(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type JwtPayload = z.infer<typeof JwtPayloadSchema>;

const encodeSegment = (value: unknown): string =>
  Buffer.from(JSON.stringify(value), "utf8").toString("base64url");

const sign = (secret: string, input: string): Buffer =>
  crypto.createHmac("sha256", secret).update(input).digest();

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

export function signJwt(payload: JwtPayload, secret: string): string {
  const input = `${encodeSegment(JWT_HEADER)}.${encodeSegment(payload)}`;
  return `${input}.${sign(secret, input).toString("base64url")}`;
}

/**
 * Issues a token for an identity whose credentials were checked upstream.
 * Used for service-to-service calls and tests.
 */
export function issueAccessToken(
  identity: { id: string; username: string; role?: string },
  secret: string,
  ttlSeconds = DEFAULT_TTL_SECONDS,
): string {
  const iat = nowSeconds();
  return signJwt(
    {
      sub: identity.id,
      username: identity.username,
      ...(identity.role ? { role: identity.role } : {}),
      iat,
      exp: iat + ttlSeconds,
    },
    secret,
  );
}

function decodePayload(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch {
    return null;
  }
}

/** HS256 only. Throws on a bad shape, signature, payload or expiry. */
export function verifyJwt(token: string, secret: string): JwtPayload {
  const [header, body, signature, ...rest] = token.split(".");
  if (header === undefined || body === undefined || signature === undefined || rest.length > 0) {
    throw new Error("Invalid JWT format");
  }

  const expected = sign(secret, `${header}.${body}`);
  const actual = Buffer.from(signature, "base64url");
  if (actual.length !== expected.length || !crypto.timingSafeEqual(actual, expected)) {
    throw new Error("Invalid JWT signature");
  }

  const parsed = JwtPayloadSchema.safeParse(decodePayload(body));
  if (!parsed.success) {
    throw new Error("Invalid JWT payload");
  }

  if (parsed.data.exp <= nowSeconds()) {
    throw new Error("JWT expired");
  }

  return parsed.data;
}
