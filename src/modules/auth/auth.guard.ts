import type { FastifyReply, FastifyRequest } from "fastify";

import type { Env } from "@/config/env";
import { verifyJwt } from "./auth.jwt";

export type RequestUser = {
  id: string;
  username: string;
  role?: string;
};

const PUBLIC_PREFIXES = ["/docs", "/health"];
const TOKEN_COOKIES = new Set(["access_token", "jwt"]);
const TOKEN_QUERY_KEYS = ["token", "access_token"];

function splitUrl(url: string): { pathname: string; query: string } {
  const idx = url.indexOf("?");
  return idx === -1
    ? { pathname: url, query: "" }
    : { pathname: url.slice(0, idx), query: url.slice(idx + 1) };
}

function nonEmpty(v: string | null | undefined): string | null {
  const t = (v ?? "").trim();
  return t.length ? t : null;
}

function fromAuthorization(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, value] = header.split(" ");
  return scheme?.toLowerCase() === "bearer" ? nonEmpty(value) : null;
}

function fromQuery(query: string): string | null {
  if (!query) return null;
  const params = new URLSearchParams(query);
  for (const key of TOKEN_QUERY_KEYS) {
    const token = nonEmpty(params.get(key));
    if (token) return token;
  }
  return null;
}

function fromCookie(header: string | undefined): string | null {
  if (!header) return null;

  for (const pair of header.split(";")) {
    const eq = pair.indexOf("=");
    if (eq === -1) continue;
    if (!TOKEN_COOKIES.has(pair.slice(0, eq).trim())) continue;
    return nonEmpty(decodeURIComponent(pair.slice(eq + 1)));
  }
  return null;
}

/**
 * Header first, then cookie. Browsers cannot set headers on a WebSocket
 * handshake, so `/ws/*` also accepts `?token=`.
 */
export function extractToken(req: FastifyRequest, allowQuery: boolean): string | null {
  return (
    fromAuthorization(req.headers.authorization) ??
    (allowQuery ? fromQuery(splitUrl(req.url).query) : null) ??
    fromCookie(req.headers.cookie)
  );
}

export function authenticate(token: string, secret: string): RequestUser {
  const payload = verifyJwt(token, secret);
  return { id: payload.sub, username: payload.username, role: payload.role };
}

/**
 * onRequest hook. HTTP routes without a valid token get 401 here; WS routes
 * are let through with no `req.user` and close the socket with 4401 themselves.
 */
export function createAuthGuard(env: Pick<Env, "AUTH_JWT_SECRET">) {
  return async function authGuard(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    if (request.method === "OPTIONS") return;

    const { pathname } = splitUrl(request.url);
    if (PUBLIC_PREFIXES.some((p) => pathname.startsWith(p))) return;

    const isWsRoute = pathname.startsWith("/ws/");
    const token = extractToken(request, isWsRoute);

    if (token) {
      try {
        request.user = authenticate(token, env.AUTH_JWT_SECRET);
        return;
      } catch (err) {
        request.log.warn({ err }, "Auth failed");
      }
    }

    if (!isWsRoute) {
      await reply.code(401).send({ message: "Unauthorized" });
    }
  };
}
