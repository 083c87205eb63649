export const APPOINTMENTS_TYPES = {
  AppointmentsGateway: Symbol.for("AppointmentsGateway"),
} as const;
