import axios from "axios";

import { ensureLogger, type LoggerLike } from "@/infra/observability";
import { UserFacingError } from "@/infra/userFacingError";
import type { AppointmentRecord, AppointmentsGateway } from "./appointments.dto";
import {
  AppointmentCompleteResponseSchema,
  AppointmentResponseSchema,
} from "./appointments.schemas";
import { toAppointmentsError } from "./appointments.errors";

const REQUEST_TIMEOUT_MS = 15_000;

export class AppointmentsHttpGateway implements AppointmentsGateway {
  private readonly log: LoggerLike;

  constructor(
    private readonly baseUrlRaw: string,
    private readonly serviceToken: string,
    log?: LoggerLike,
  ) {
    this.log = ensureLogger(log);
  }

  private get baseUrl(): string {
    return this.baseUrlRaw.replace(/\/+$/, "");
  }

  private appointmentUrl(appointmentId: string, suffix = ""): string {
    return `${this.baseUrl}/appointments/${encodeURIComponent(appointmentId)}${suffix}`;
  }

  private get headers() {
    return {
      Authorization: `Bearer ${this.serviceToken}`,
      "Content-Type": "application/json",
    };
  }

  async getAppointment(appointmentId: string): Promise<AppointmentRecord> {
    try {
      const res = await axios.get(this.appointmentUrl(appointmentId), {
        headers: this.headers,
        timeout: REQUEST_TIMEOUT_MS,
      });
      return AppointmentResponseSchema.parse(res.data);
    } catch (e) {
      throw toAppointmentsError(e, this.log);
    }
  }

  async markCompleted(appointmentId: string): Promise<void> {
    try {
      const res = await axios.post(
        this.appointmentUrl(appointmentId, "/complete"),
        {},
        { headers: this.headers, timeout: REQUEST_TIMEOUT_MS },
      );

      const parsed = AppointmentCompleteResponseSchema.parse(res.data);
      this.log.info(
        { appointmentId: parsed.id, status: parsed.status },
        "[appointments] marked completed",
      );
    } catch (e) {
      throw toAppointmentsError(e, this.log);
    }
  }
}

/**
 * Used when no booking service is configured (local development). Party
 * lookups fail closed: without the booking service nobody can open a room.
 */
export class LoggingAppointmentsGateway implements AppointmentsGateway {
  private readonly log: LoggerLike;

  constructor(log?: LoggerLike) {
    this.log = ensureLogger(log);
  }

  getAppointment(appointmentId: string): Promise<AppointmentRecord> {
    this.log.warn(
      { appointmentId },
      "[appointments] APPOINTMENTS_API_URL not set; cannot resolve appointment",
    );
    return Promise.reject(
      new UserFacingError({
        code: "APPOINTMENTS_UNAVAILABLE",
        statusCode: 503,
        userMessage: "Booking service is not configured.",
      }),
    );
  }

  markCompleted(appointmentId: string): Promise<void> {
    this.log.warn(
      { appointmentId },
      "[appointments] APPOINTMENTS_API_URL not set; completion not forwarded",
    );
    return Promise.resolve();
  }
}
