import { UserFacingError } from "@/infra/userFacingError";
import {
  isAxiosError,
  formatAxiosErrorForLog,
  safeJson,
} from "@/capabilities/shared/axiosError";
import type { LoggerLike } from "@/infra/observability";

type UnknownRecord = Record<string, unknown>;

function isRecord(v: unknown): v is UnknownRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function toAppointmentsError(e: unknown, log: LoggerLike): Error {
  if (!isAxiosError(e)) {
    const msg = e instanceof Error ? e.message : String(e);
    log.error({ message: msg }, "[appointments] error");
    return e instanceof Error ? e : new Error(msg);
  }

  log.error(formatAxiosErrorForLog(e), "[appointments] error response");

  const status = e.response?.status;
  const upstreamMessage = extractMessage(e.response?.data);

  if (status === 404) {
    return new UserFacingError({
      code: "APPOINTMENT_NOT_FOUND",
      statusCode: 404,
      userMessage: "Appointment not found.",
      debugMessage: upstreamMessage,
      details: { status },
    });
  }

  if (status === 401 || status === 403) {
    return new UserFacingError({
      code: "APPOINTMENTS_UNAUTHORIZED",
      statusCode: 502,
      userMessage: "Booking service rejected our credentials.",
      debugMessage: upstreamMessage,
      details: { status },
    });
  }

  return new UserFacingError({
    code: "APPOINTMENTS_UNAVAILABLE",
    statusCode: 502,
    userMessage: "Booking service is unavailable.",
    debugMessage: upstreamMessage ?? e.message,
    details: { status: status ?? null },
  });
}

function extractMessage(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;

  const msg = data.message ?? data.error;
  if (typeof msg === "string" && msg.trim().length > 0) return msg;

  return safeJson(data);
}
