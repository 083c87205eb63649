/**
 * An appointment as the booking service reports it. The booking service is
 * the only source of truth for who the parties are.
 */
export type AppointmentRecord = {
  id: string;
  studentId: string;
  counselorId: string;
  /** Free text upstream; callers map it onto their own kinds. */
  sessionType: string | null;
  scheduledStart: Date;
  observerIds: string[];
};

/**
 * Outbound port to the booking service that owns appointments.
 */
export interface AppointmentsGateway {
  /** Throws `APPOINTMENT_NOT_FOUND` (404) when the booking service has no such id. */
  getAppointment(appointmentId: string): Promise<AppointmentRecord>;
  markCompleted(appointmentId: string): Promise<void>;
}
